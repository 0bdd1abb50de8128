// tests/shield.test.ts

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import type { IProgressBar } from '../src/@types/index.js';
import { config } from '../src/config/index.js';
import { CancelledError, InvalidImageError, ModelUnavailableError } from '../src/errors/index.js';
import { FeatureExtractorAdapter } from '../src/core/extractor/FeatureExtractorAdapter.js';
import { FeatureExtractorRegistry } from '../src/core/extractor/registry.js';
import { SeededConvNetModel } from '../src/core/extractor/strategies/SeededConvNetModel.js';
import { PixelBuffer } from '../src/core/pixelBuffer/PixelBuffer.js';
import { levelToSpec, protect, quantizedShift, score } from '../src/core/shield/index.js';
import { measureDistortion, projectPerturbation } from '../src/core/shield/perturbation.js';
import { divergenceToScore } from '../src/core/shield/robustness.js';
import { createSaturatedImage, createSmoothImage } from './helpers/imageFactory.js';
import { MockLogger } from './helpers/mockLogger.js';

const logger = new MockLogger();
let extractor: FeatureExtractorAdapter;

beforeAll(() => {
    extractor = new FeatureExtractorAdapter(new SeededConvNetModel());
});

afterAll(() => {
    extractor.dispose();
});

describe('Perturbation budget', () => {
    it('should map protection levels linearly', () => {
        expect(levelToSpec(0)).toEqual({ epsilon: 0, steps: 0, stepSize: 0, targetMode: 'untargeted' });

        const low = levelToSpec(1);
        expect(low.steps).toBe(2);

        const full = levelToSpec(100, 'embedding');
        expect(full.epsilon).toBeCloseTo(32 / 255, 12);
        expect(full.steps).toBe(10);
        expect(full.stepSize).toBeCloseTo((2.5 * 32) / 255 / 10, 12);
        expect(full.targetMode).toBe('embedding');

        expect(levelToSpec(50).steps).toBe(6);
    });

    it('should reject levels outside 0-100', () => {
        expect(() => levelToSpec(-1)).toThrow(RangeError);
        expect(() => levelToSpec(101)).toThrow(RangeError);
        expect(() => levelToSpec(Number.NaN)).toThrow(RangeError);
    });

    it('should truncate the sample shift to multiples of 8', () => {
        expect(quantizedShift(levelToSpec(20).epsilon)).toBe(8);
        expect(quantizedShift(levelToSpec(40).epsilon)).toBe(16);
        expect(quantizedShift(levelToSpec(80).epsilon)).toBe(24);
        expect(quantizedShift(levelToSpec(100).epsilon)).toBe(32);
        expect(quantizedShift(0.1)).toBe(24);
    });

    it('should keep the low three bits and alpha while projecting', () => {
        const image = PixelBuffer.fromRaw({
            width: 2,
            height: 1,
            channels: 4,
            data: Uint8Array.of(5, 250, 131, 77, 100, 3, 255, 200),
        });
        const delta = Float32Array.of(0.1, 0.1, -0.1, -0.1, 0.1, 0);
        const projected = projectPerturbation(image, delta, 16 / 255);
        // 250 and 255 (zero delta) cannot go up from base 248, so they go down
        expect(Array.from(projected.toUint8Array())).toEqual([21, 234, 115, 77, 84, 19, 239, 200]);
        expect(measureDistortion(image, projected)).toBe(16 / 255);
    });

    it('should move saturated and undirected samples by the full shift', () => {
        const image = PixelBuffer.fromRaw({
            width: 2,
            height: 2,
            channels: 3,
            data: Uint8Array.of(0, 255, 7, 248, 0, 255, 1, 254, 128, 240, 6, 249),
        });
        const delta = Float32Array.of(-0.1, 0.1, 0, 0.1, 0, 0, -0.1, 0.1, 0, 0.1, -0.1, -0.1);
        const projected = projectPerturbation(image, delta, 24 / 255);
        expect(Array.from(projected.toUint8Array())).toEqual([24, 231, 31, 224, 24, 231, 25, 230, 152, 216, 30, 225]);
        expect(measureDistortion(image, projected)).toBe(24 / 255);
    });

    it('should follow the summed direction for grayscale', () => {
        const image = PixelBuffer.fromRaw({ width: 2, height: 1, channels: 1, data: Uint8Array.of(100, 100) });
        const projected = projectPerturbation(image, Float32Array.of(0.1, -0.05, 0, -0.1, -0.1, 0.15), 8 / 255);
        expect(Array.from(projected.toUint8Array())).toEqual([108, 92]);
        expect(measureDistortion(image, projected)).toBe(8 / 255);
    });
});

describe('protect', () => {
    it('should return a scored copy at level 0', async () => {
        const image = createSmoothImage(32, 32, 3);
        const result = await protect(image, 0, { extractor, logger });
        expect(result.image.equals(image)).toBe(true);
        expect(result.image).not.toBe(image);
        expect(result.distortion).toBe(0);
        expect(result.objectiveTrace).toEqual([]);
        expect(result.budgetRescaled).toBe(false);
        expect(result.robustnessScore).toBeGreaterThanOrEqual(0);
        expect(result.robustnessScore).toBeLessThanOrEqual(100);
    });

    it('should never decrease distortion as the level rises', async () => {
        const image = createSmoothImage(64, 64, 3, 'distortion');
        const distortions: number[] = [];
        for (const level of [0, 20, 40, 60, 80, 100]) {
            distortions.push((await protect(image, level, { extractor, logger })).distortion);
        }
        for (let i = 1; i < distortions.length; i++) {
            expect(distortions[i]).toBeGreaterThanOrEqual(distortions[i - 1]);
        }
        expect(distortions[1]).toBeCloseTo(8 / 255, 10);
        expect(distortions[4]).toBeCloseTo(24 / 255, 10);
    });

    it('should never decrease distortion on saturated images', async () => {
        const image = createSaturatedImage(32, 32, 'saturated');
        const levels = [34, 40, 50, 60, 66, 67, 75, 85, 99, 100];
        const distortions: number[] = [];
        for (const level of levels) {
            distortions.push((await protect(image, level, { extractor, logger })).distortion);
        }
        for (let i = 1; i < distortions.length; i++) {
            expect(distortions[i]).toBeGreaterThanOrEqual(distortions[i - 1]);
        }
        // 34..66 shift by 16, 67..99 by 24, 100 is rescaled back to 24
        expect(distortions.map((d) => Math.round(d * 255))).toEqual([16, 16, 16, 16, 16, 24, 24, 24, 24, 24]);
    });

    it('should keep every sample within the quantized budget and preserve low bits', async () => {
        const image = createSmoothImage(48, 48, 4, 'budget');
        const result = await protect(image, 80, { extractor, logger });
        for (let i = 0; i < image.sampleCount; i++) {
            const before = image.sampleAt(i);
            const after = result.image.sampleAt(i);
            expect(after & 7).toBe(before & 7);
            expect(Math.abs(after - before)).toBe(i % 4 === 3 ? 0 : 24);
        }
        expect(result.objectiveTrace).toHaveLength(result.spec.steps);
    });

    it('should rescale epsilon when the distortion budget is exceeded', async () => {
        const image = createSmoothImage(32, 32, 3, 'rescale');
        const warnings = new MockLogger();
        const full = await protect(image, 100, { extractor, logger: warnings });
        expect(full.budgetRescaled).toBe(true);
        expect(warnings.messages.warn).toHaveLength(1);
        expect(warnings.messages.warn[0]).toMatch(/^Distortion 0\.\d{4} exceeds the budget of 0\.1; rescaling epsilon to 0\.1\.$/);
        expect(full.spec.epsilon).toBe(0.1);
        expect(full.distortion).toBeCloseTo(24 / 255, 10);

        const original = config.shield.maxDistortion;
        config.shield.maxDistortion = 0.05;
        try {
            const tight = await protect(image, 80, { extractor, logger });
            expect(tight.budgetRescaled).toBe(true);
            expect(tight.spec.epsilon).toBe(0.05);
            expect(tight.distortion).toBeCloseTo(8 / 255, 10);
        } finally {
            config.shield.maxDistortion = original;
        }
    });

    it('should be deterministic', async () => {
        const image = createSmoothImage(32, 32, 3, 'deterministic');
        const first = await protect(image, 60, { extractor, logger });
        const second = await protect(image, 60, { extractor, logger });
        expect(first.image.equals(second.image)).toBe(true);
        expect(first.objectiveTrace).toEqual(second.objectiveTrace);
    });

    it('should push the embedding away in embedding mode', async () => {
        const image = createSmoothImage(32, 32, 3, 'embedding');
        const result = await protect(image, 50, { extractor, logger, targetMode: 'embedding' });
        expect(result.spec.targetMode).toBe('embedding');
        expect(result.objectiveTrace).toHaveLength(6);
        expect(result.objectiveTrace[5]).toBeGreaterThan(0);
    });

    it('should cancel before starting when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(
            protect(createSmoothImage(16, 16, 3), 50, { extractor, logger, signal: controller.signal }),
        ).rejects.toBeInstanceOf(CancelledError);
    });

    it('should cancel between optimization steps', async () => {
        const controller = new AbortController();
        const states: string[] = [];
        const stop = vi.fn();
        const progressBar: IProgressBar = {
            start: () => {},
            stop,
            increment: (payload) => {
                const state = String(payload?.state);
                states.push(state);
                if (state.startsWith('STEP')) controller.abort();
            },
        };
        await expect(
            protect(createSmoothImage(32, 32, 3), 80, { extractor, logger, signal: controller.signal, progressBar }),
        ).rejects.toBeInstanceOf(CancelledError);
        expect(states.filter((state) => state.startsWith('STEP'))).toEqual(['STEP 1/8']);
        expect(states).not.toContain('COMPLETED');
        expect(stop).toHaveBeenCalledTimes(1);
    });

    it('should validate the image before loading a model', async () => {
        const loader = async () => {
            throw new Error('should not load');
        };
        const registry = new FeatureExtractorRegistry(loader, logger);
        const empty = { width: 0, height: 0, channels: 3 as const, data: new Uint8Array(0) };
        await expect(protect(empty, 50, { registry, logger })).rejects.toBeInstanceOf(InvalidImageError);
        await expect(score(empty, { registry, logger })).rejects.toBeInstanceOf(InvalidImageError);
        expect(registry.isLoaded).toBe(false);
    });

    it('should fail with ModelUnavailableError instead of returning an unprotected image', async () => {
        const registry = new FeatureExtractorRegistry(async () => {
            throw new Error('weights missing');
        }, logger);
        await expect(protect(createSmoothImage(16, 16, 3), 50, { registry, logger })).rejects.toBeInstanceOf(
            ModelUnavailableError,
        );
    });
});

describe('score', () => {
    it('should map squeeze divergence onto 0-100', () => {
        expect(divergenceToScore(0)).toBe(0);
        expect(divergenceToScore(Number.NaN)).toBe(0);
        expect(divergenceToScore(0.01)).toBe(50);
        expect(divergenceToScore(0.04)).toBe(66.67);
        expect(divergenceToScore(0.0025)).toBe(33.33);
    });

    it('should not decrease on average with the protection level', async () => {
        let low = 0;
        let high = 0;
        const corpus = Array.from({ length: 20 }, (_, i) => createSmoothImage(64, 64, 3, `corpus-${i}`));
        for (const image of corpus) {
            low += (await protect(image, 40, { extractor, logger })).robustnessScore;
            high += (await protect(image, 80, { extractor, logger })).robustnessScore;
        }
        expect(high / corpus.length).toBeGreaterThanOrEqual(low / corpus.length);
    });

    it('should agree with the score reported by protect', async () => {
        const result = await protect(createSmoothImage(32, 32, 3, 'agree'), 70, { extractor, logger });
        expect(await score(result.image, { extractor, logger })).toBe(result.robustnessScore);
    });

    it('should stay within 0-100', async () => {
        const value = await score(createSmoothImage(40, 24, 1), { extractor, logger });
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
    });
});
