// src/core/forensics/lsbStatistics.ts

import type { IWatermarkScan } from '../../@types/index.js';
import type { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';

/**
 * Share of color samples whose least significant bit is set.
 */
export function lsbOnesRatio(buffer: PixelBuffer): number {
    const { channels, colorChannels, pixelCount } = buffer;
    let ones = 0;
    for (let p = 0; p < pixelCount; p++) {
        for (let c = 0; c < colorChannels; c++) {
            ones += buffer.sampleAt(p * channels + c) & 1;
        }
    }
    return ones / (pixelCount * colorChannels);
}

/**
 * LSB disorder in [0, 1]. Where watermark copies were located, it grows with
 * how far the copies stray from their consensus (half of all bits flipped
 * already counts as full disorder); with no copies to compare it is 1.
 */
export function lsbDisorder(scan: IWatermarkScan): number {
    if (scan.copiesFound === 0) return 1;
    return Math.min(1, 2 * scan.bitDisagreement);
}
