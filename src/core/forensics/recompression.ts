// src/core/forensics/recompression.ts

import { config } from '../../config/index.js';
import type { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import _ from 'lodash';

function luminance(buffer: PixelBuffer): Float64Array {
    const { channels, pixelCount } = buffer;
    const gray = new Float64Array(pixelCount);
    for (let p = 0; p < pixelCount; p++) {
        const base = p * channels;
        gray[p] =
            channels === 1
                ? buffer.sampleAt(base)
                : 0.299 * buffer.sampleAt(base) + 0.587 * buffer.sampleAt(base + 1) + 0.114 * buffer.sampleAt(base + 2);
    }
    return gray;
}

/**
 * Blockiness per grid offset: mean absolute difference across column
 * boundaries `x -> x + 1` plus across row boundaries `y -> y + 1`, for every
 * `x, y` congruent to the offset modulo the block size.
 */
export function blockiness(gray: Float64Array, width: number, height: number, blockSize: number): Float64Array {
    const result = new Float64Array(blockSize);
    for (let offset = 0; offset < blockSize; offset++) {
        let hSum = 0;
        let hCount = 0;
        for (let x = offset; x < width - 1; x += blockSize) {
            let columnDiff = 0;
            for (let y = 0; y < height; y++) {
                columnDiff += Math.abs(gray[y * width + x] - gray[y * width + x + 1]);
            }
            hSum += columnDiff / height;
            hCount++;
        }

        let vSum = 0;
        let vCount = 0;
        for (let y = offset; y < height - 1; y += blockSize) {
            let rowDiff = 0;
            for (let x = 0; x < width; x++) {
                rowDiff += Math.abs(gray[y * width + x] - gray[(y + 1) * width + x]);
            }
            vSum += rowDiff / width;
            vCount++;
        }

        result[offset] = (hCount > 0 ? hSum / hCount : 0) + (vCount > 0 ? vSum / vCount : 0);
    }
    return result;
}

/**
 * Ratio of blockiness on the block-grid boundary to the mean blockiness
 * inside blocks. Block-based lossy compression leaves it well above 1.
 * Images smaller than two blocks in either direction report 1.
 */
export function blockGridRatio(buffer: PixelBuffer): number {
    const { blockSize } = config.forensics;
    if (buffer.width < 2 * blockSize || buffer.height < 2 * blockSize) return 1;

    const b = blockiness(luminance(buffer), buffer.width, buffer.height, blockSize);
    const inside = _.mean(Array.from(b.subarray(0, blockSize - 1)));
    return inside > 0 ? b[blockSize - 1] / inside : 1;
}

/**
 * Recompression signal in [0, 1] for a block-grid ratio.
 */
export function recompressionSignal(ratio: number): number {
    const ceiling = config.forensics.recompressionRatioCeiling;
    return _.clamp((ratio - 1) / (ceiling - 1), 0, 1);
}
