// src/core/forensics/index.ts

import type { IAnalyzeOptions, ImageInput, ITamperVerdict, IWatermarkScan, TamperFlag } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { round2 } from '../../utils/misc/helpers.js';
import { getLogger } from '../../utils/logging/logUtils.js';
import { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { scanWatermark } from '../watermark/extract.js';
import { lsbDisorder, lsbOnesRatio } from './lsbStatistics.js';
import { blockGridRatio, recompressionSignal } from './recompression.js';

/**
 * Watermark signal in [0, 1]: 1 when absent, 0.75 when only corrupted copies
 * remain, and for a valid mark half the share of copies that failed.
 */
export function watermarkSignal(scan: IWatermarkScan): number {
    switch (scan.validity) {
        case 'not_found':
            return 1;
        case 'corrupted':
            return 0.75;
        case 'valid':
            return scan.copiesFound === 0 ? 0 : 0.5 * (1 - scan.validCopies / scan.copiesFound);
    }
}

/**
 * Scores how likely `image` was altered after it was watermarked.
 *
 * The confidence is a fixed weighted sum of three signals (LSB disorder,
 * watermark state, block-grid recompression) and is monotonic in each.
 * An owner mismatch is flagged but leaves the confidence unchanged.
 *
 * @param image - Image to inspect.
 * @param claimedOwnerId - Owner the image is said to carry; omit to skip the owner check.
 * @param options - Optional logger.
 * @return Confidence in [0, 100], flags, recovered owner and the raw signals.
 *
 * @throws InvalidImageError if `image` is malformed.
 */
export function analyze(image: ImageInput, claimedOwnerId?: string, options: IAnalyzeOptions = {}): ITamperVerdict {
    const logger = options.logger ?? getLogger('forensics');
    const buffer = PixelBuffer.from(image);
    const { weights, lsbDisturbanceThreshold, lsbFlattenedThreshold, recompressionRatioThreshold } = config.forensics;

    const scan = scanWatermark(buffer, { logger });
    const onesRatio = lsbOnesRatio(buffer);
    const gridRatio = blockGridRatio(buffer);
    const signals = {
        lsbDisorder: lsbDisorder(scan),
        watermark: watermarkSignal(scan),
        recompression: recompressionSignal(gridRatio),
        watermarkValidity: scan.validity,
        blockGridRatio: gridRatio,
        lsbOnesRatio: onesRatio,
    };

    const flags: TamperFlag[] = [];
    if (scan.copiesFound > 0 && scan.bitDisagreement > lsbDisturbanceThreshold) flags.push('lsb-plane-disturbed');
    if (onesRatio < lsbFlattenedThreshold || onesRatio > 1 - lsbFlattenedThreshold) flags.push('lsb-plane-flattened');
    if (scan.validity === 'not_found') flags.push('watermark-missing');
    if (scan.validity === 'corrupted') flags.push('watermark-corrupted');
    if (scan.partialRecovery) flags.push('watermark-partially-recovered');
    if (gridRatio >= recompressionRatioThreshold) flags.push('recompression-detected');

    const recoveredOwnerId = scan.payload?.ownerId ?? null;
    let ownerMatch: boolean | null = null;
    if (claimedOwnerId !== undefined) {
        ownerMatch = recoveredOwnerId === claimedOwnerId;
        if (!ownerMatch) flags.push('owner-mismatch');
    }

    const tamperConfidence = round2(
        100 *
            (weights.lsb * signals.lsbDisorder +
                weights.watermark * signals.watermark +
                weights.recompression * signals.recompression),
    );
    logger.debug(`Tamper confidence ${tamperConfidence}; flags: ${flags.join(', ') || 'none'}.`);

    return { tamperConfidence, flags, ownerMatch, recoveredOwnerId, signals };
}
