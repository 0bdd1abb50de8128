// src/core/watermark/embed.ts

import type { IEmbedResult, IImageInfo, ImageInput, IWatermarkOptions } from '../../@types/index.js';
import { CapacityError } from '../../errors/index.js';
import { bytesToBits } from '../../utils/bitManipulation/bitUtils.js';
import { getLogger } from '../../utils/logging/logUtils.js';
import { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { capacityBits, effectiveDepths, getBitPlan, maxBitsPerSample } from './bitPlans.js';
import { writeCyclicBitStream } from './bitStream.js';
import { WatermarkPayload } from './payload.js';

/**
 * Smallest square side whose capacity at `bitsPerPixelPair / 2` bits per pixel reaches `requiredBits`.
 */
function minimumSquareSide(requiredBits: number, bitsPerPixelPair: number): number {
    if (bitsPerPixelPair === 0) return Infinity;
    return Math.ceil(Math.sqrt((2 * requiredBits) / bitsPerPixelPair));
}

/**
 * Embeds `ownerId` into the low bit planes of a copy of `image`.
 *
 * The serialized payload is written from the first sample onwards and
 * repeated over the whole capacity of the chosen strength, so every
 * surviving copy can vote during extraction.
 *
 * @param image - Carrier image; never modified.
 * @param ownerId - Owner id, 1 to 1024 UTF-8 bytes.
 * @param strength - Bit plan to write with, 1 (one bit per pixel) to 10 (three bits in every channel).
 * @param options - Optional logger.
 * @return The watermarked copy together with capacity and copy statistics.
 *
 * @throws InvalidImageError if `image` is malformed.
 * @throws RangeError if `strength` is not an integer in 1..10.
 * @throws WatermarkPayloadError if `ownerId` is empty or too long.
 * @throws CapacityError if not even one full copy fits.
 */
export function embed(image: ImageInput, ownerId: string, strength: number, options: IWatermarkOptions = {}): IEmbedResult {
    const logger = options.logger ?? getLogger('watermark');
    const buffer = PixelBuffer.from(image);
    const bitPlan = getBitPlan(strength);
    const payload = WatermarkPayload.create(ownerId);

    const info: IImageInfo = buffer.info;
    const available = capacityBits(info, bitPlan);
    if (available < payload.bitLength) {
        const { even, odd } = effectiveDepths(bitPlan, info.channels);
        const pairBits = [...even, ...odd].reduce((acc, d) => acc + d, 0);
        throw new CapacityError(payload.bitLength, available, minimumSquareSide(payload.bitLength, pairBits));
    }

    const bits = bytesToBits(payload.toBytes());
    const watermarked = buffer.map((samples) => {
        writeCyclicBitStream(samples, info, bitPlan, bits);
    });

    const copies = Math.floor(available / payload.bitLength);
    logger.debug(
        `Embedded ${payload.byteLength}-byte payload at strength ${bitPlan.strength}: ${copies} full copies in ${available} bits.`,
    );

    return {
        image: watermarked,
        strength: bitPlan.strength,
        bitsPerSample: maxBitsPerSample(bitPlan, info.channels),
        capacityBits: available,
        payloadBits: payload.bitLength,
        copies,
        utilization: payload.bitLength / available,
    };
}
