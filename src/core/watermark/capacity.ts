// src/core/watermark/capacity.ts

import type { IImageInfo } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { validateImageInfo } from '../pixelBuffer/PixelBuffer.js';
import { capacityBits, getBitPlan } from './bitPlans.js';
import { PAYLOAD_OVERHEAD_BYTES } from './payload.js';

/**
 * Bits available to the watermark for an image of this layout at `strength`.
 *
 * @throws InvalidImageError for an invalid layout.
 * @throws RangeError for an unsupported strength.
 */
export function computeCapacity(info: IImageInfo, strength: number): number {
    return capacityBits(validateImageInfo(info), getBitPlan(strength));
}

/**
 * Longest owner id, in UTF-8 bytes, of which one full copy still fits.
 *
 * @param info - Width, height and channel count of the carrier.
 * @param strength - Watermark strength in 1..10.
 * @return Byte length in 0..1024; 0 when not even a one-byte id fits.
 */
export function maxOwnerIdBytes(info: IImageInfo, strength: number): number {
    const fitting = Math.floor(computeCapacity(info, strength) / 8) - PAYLOAD_OVERHEAD_BYTES;
    return Math.max(0, Math.min(fitting, config.watermark.maxOwnerIdBytes));
}
