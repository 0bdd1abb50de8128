// src/core/shield/index.ts

import type { ImageInput, IProtectOptions, IScoreOptions, IShieldResult } from '../../@types/index.js';
import { getLogger } from '../../utils/logging/logUtils.js';
import { withExtractor } from '../extractor/registry.js';
import { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { levelToSpec } from './perturbation.js';
import { robustnessScore } from './robustness.js';
import { ShieldStateMachine } from './stateMachine.js';

/**
 * Adds a bounded adversarial perturbation to a copy of `image` and scores the result.
 *
 * The image and level are validated before the feature extractor is touched.
 * Pixel changes are whole multiples of 8 per sample, so a watermark embedded
 * beforehand survives.
 *
 * @param image - Image to shield; never modified.
 * @param protectionLevel - 0 (copy only) to 100 (largest budget).
 * @param options - Extractor or registry, target mode, cancellation signal, progress bar and logger.
 * @return The perturbed copy, its robustness score, distortion and effective budget.
 *
 * @throws InvalidImageError if `image` is malformed.
 * @throws RangeError if `protectionLevel` is outside [0, 100].
 * @throws ModelUnavailableError if the feature extractor cannot be loaded.
 * @throws CancelledError if `options.signal` is aborted before the run finishes.
 */
export async function protect(
    image: ImageInput,
    protectionLevel: number,
    options: IProtectOptions = {},
): Promise<IShieldResult> {
    const buffer = PixelBuffer.from(image);
    const spec = levelToSpec(protectionLevel, options.targetMode);
    const logger = options.logger ?? getLogger('shield');

    return withExtractor(options, async (adapter) => {
        const machine = new ShieldStateMachine({
            logger,
            verbose: options.verbose ?? logger.verbose,
            progressBar: options.progressBar,
            signal: options.signal,
            adapter,
            image: buffer,
            spec,
        });
        await machine.run();
        return machine.getResult();
    });
}

/**
 * Robustness score of `image` in [0, 100]; higher means harder to extract features from.
 *
 * @throws InvalidImageError if `image` is malformed.
 * @throws ModelUnavailableError if the feature extractor cannot be loaded.
 */
export async function score(image: ImageInput, options: IScoreOptions = {}): Promise<number> {
    const buffer = PixelBuffer.from(image);
    const logger = options.logger ?? getLogger('shield');
    return withExtractor(options, async (adapter) => {
        const result = robustnessScore(adapter, buffer);
        logger.debug(`Robustness score ${result} for ${buffer.width}x${buffer.height} image.`);
        return result;
    });
}

export { levelToSpec, quantizedShift } from './perturbation.js';
export { shieldProgressTotal } from './stateMachine.js';
