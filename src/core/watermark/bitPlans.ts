// src/core/watermark/bitPlans.ts

import type { IBitPlan, IImageInfo, WatermarkStrength } from '../../@types/index.js';
import { config } from '../../config/index.js';

type Depths = readonly [number, number, number, number];

const plan = (strength: WatermarkStrength, even: Depths, odd: Depths = even): IBitPlan => ({ strength, even, odd });

/**
 * Strength -> bits per sample for R, G, B, A. Each step adds one bit per pixel
 * pair, so capacity grows strictly for 3 and 4 channel images; strength 9
 * tops up only the even pixels' blue channel to get there.
 */
export const BIT_PLANS: readonly IBitPlan[] = [
    plan(1, [1, 0, 0, 0]),
    plan(2, [1, 1, 0, 0]),
    plan(3, [1, 1, 1, 0]),
    plan(4, [2, 1, 1, 0]),
    plan(5, [2, 2, 1, 0]),
    plan(6, [2, 2, 2, 0]),
    plan(7, [3, 2, 2, 0]),
    plan(8, [3, 3, 2, 0]),
    plan(9, [3, 3, 3, 0], [3, 3, 2, 0]),
    plan(10, [3, 3, 3, 3]),
];

export const SUPPORTED_STRENGTHS: readonly WatermarkStrength[] = BIT_PLANS.map((p) => p.strength);

export function isWatermarkStrength(value: number): value is WatermarkStrength {
    return Number.isInteger(value) && value >= config.watermark.minStrength && value <= config.watermark.maxStrength;
}

/**
 * @throws RangeError for anything but an integer in 1..10.
 */
export function getBitPlan(strength: number): IBitPlan {
    if (!isWatermarkStrength(strength)) {
        throw new RangeError(
            `Watermark strength must be an integer between ${config.watermark.minStrength} and ${config.watermark.maxStrength}, got ${strength}.`,
        );
    }
    return BIT_PLANS[strength - 1];
}

/**
 * Depths for the channels actually present, even pixels first.
 */
export function effectiveDepths(bitPlan: IBitPlan, channels: number): { even: number[]; odd: number[] } {
    return {
        even: bitPlan.even.slice(0, channels),
        odd: bitPlan.odd.slice(0, channels),
    };
}

export function maxBitsPerSample(bitPlan: IBitPlan, channels: number): number {
    const { even, odd } = effectiveDepths(bitPlan, channels);
    return Math.max(...even, ...odd);
}

/**
 * Total payload bits a buffer of this layout carries at the given plan.
 */
export function capacityBits(info: IImageInfo, bitPlan: IBitPlan): number {
    const { even, odd } = effectiveDepths(bitPlan, info.channels);
    const pixels = info.width * info.height;
    const evenPixels = Math.ceil(pixels / 2);
    const oddPixels = pixels - evenPixels;
    const sum = (depths: number[]) => depths.reduce((acc, d) => acc + d, 0);
    return evenPixels * sum(even) + oddPixels * sum(odd);
}

/**
 * Plans in ascending strength order, skipping those whose layout for this
 * channel count repeats an earlier one (e.g. strengths 1-3 on grayscale).
 */
export function distinctPlansFor(channels: number): IBitPlan[] {
    const seen = new Set<string>();
    const plans: IBitPlan[] = [];
    for (const bitPlan of BIT_PLANS) {
        const { even, odd } = effectiveDepths(bitPlan, channels);
        const key = `${even.join(',')}|${odd.join(',')}`;
        if (!seen.has(key)) {
            seen.add(key);
            plans.push(bitPlan);
        }
    }
    return plans;
}
