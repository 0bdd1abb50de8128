// src/core/watermark/bitStream.ts

import type { IBitPlan, IImageInfo } from '../../@types/index.js';
import { extractBits, insertBits } from '../../utils/bitManipulation/bitUtils.js';
import { effectiveDepths } from './bitPlans.js';

/**
 * Writes `bits` (one bit per entry) into the low bit planes of `samples`,
 * pixel by pixel in raster order and channel by channel within a pixel.
 * Each sample takes its depth's worth of bits, MSB first. The stream is
 * repeated cyclically until every slot of the plan is filled.
 *
 * @return The number of bits written, i.e. the plan's capacity.
 */
export function writeCyclicBitStream(samples: Uint8Array, info: IImageInfo, bitPlan: IBitPlan, bits: Uint8Array): number {
    const { even, odd } = effectiveDepths(bitPlan, info.channels);
    const pixels = info.width * info.height;
    let cursor = 0;

    for (let pixel = 0; pixel < pixels; pixel++) {
        const depths = pixel & 1 ? odd : even;
        const base = pixel * info.channels;
        for (let channel = 0; channel < depths.length; channel++) {
            const depth = depths[channel];
            if (depth === 0) continue;
            let value = 0;
            for (let b = 0; b < depth; b++) {
                value = (value << 1) | bits[cursor % bits.length];
                cursor++;
            }
            samples[base + channel] = insertBits(samples[base + channel], value, 0, depth);
        }
    }

    return cursor;
}

/**
 * Reads back every bit slot of the plan, in the order `writeCyclicBitStream` fills them.
 */
export function readBitStream(samples: Uint8Array, info: IImageInfo, bitPlan: IBitPlan): Uint8Array {
    const { even, odd } = effectiveDepths(bitPlan, info.channels);
    const pixels = info.width * info.height;
    const sum = (depths: number[]) => depths.reduce((acc, d) => acc + d, 0);
    const total = Math.ceil(pixels / 2) * sum(even) + Math.floor(pixels / 2) * sum(odd);
    const bits = new Uint8Array(total);
    let cursor = 0;

    for (let pixel = 0; pixel < pixels; pixel++) {
        const depths = pixel & 1 ? odd : even;
        const base = pixel * info.channels;
        for (let channel = 0; channel < depths.length; channel++) {
            const depth = depths[channel];
            for (let b = depth - 1; b >= 0; b--) {
                bits[cursor++] = extractBits(samples[base + channel], b, 1);
            }
        }
    }

    return bits;
}
