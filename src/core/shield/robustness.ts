// src/core/shield/robustness.ts

import { config } from '../../config/index.js';
import { round2 } from '../../utils/misc/helpers.js';
import type { FeatureExtractorAdapter } from '../extractor/FeatureExtractorAdapter.js';
import type { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { toModelRgb } from './perturbation.js';

/**
 * Maps a squeeze divergence onto [0, 100]: 50 at the reference divergence,
 * rising towards 100 as the features become less stable under smoothing.
 */
export function divergenceToScore(divergence: number): number {
    if (!(divergence > 0)) return 0;
    return round2(100 / (1 + Math.sqrt(config.robustness.referenceDivergence / divergence)));
}

/**
 * Robustness of an image against feature extraction, measured as how far a
 * light box blur moves its embedding. Adversarial noise makes features
 * brittle, so protected images move further.
 */
export function robustnessScore(adapter: FeatureExtractorAdapter, buffer: PixelBuffer): number {
    return divergenceToScore(adapter.squeezeDivergence(toModelRgb(buffer), buffer.height, buffer.width));
}
