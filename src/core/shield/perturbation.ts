// src/core/shield/perturbation.ts

import type { IPerturbationSpec, IReferenceFeatures, TargetMode } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { CancelledError } from '../../errors/index.js';
import type { FeatureExtractorAdapter } from '../extractor/FeatureExtractorAdapter.js';
import type { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import _ from 'lodash';
import { setImmediate } from 'node:timers/promises';
import seedrandom from 'seedrandom';

/** Low bit planes the projection leaves alone, i.e. every plane the watermark may use. */
const PRESERVED_UNIT = 2 ** config.watermark.maxBitsPerSample;
const PRESERVED_MASK = PRESERVED_UNIT - 1;
const HIGHEST_BASE = 255 - PRESERVED_MASK;

/**
 * Maps a protection level in [0, 100] linearly onto the perturbation budget.
 * Level 0 means no perturbation at all.
 *
 * @throws RangeError for levels outside [0, 100].
 */
export function levelToSpec(level: number, targetMode: TargetMode = config.shield.targetMode): IPerturbationSpec {
    if (!Number.isFinite(level) || level < 0 || level > 100) {
        throw new RangeError(`Protection level must be between 0 and 100, got ${level}.`);
    }
    if (level === 0) {
        return { epsilon: 0, steps: 0, stepSize: 0, targetMode };
    }
    const { minEpsilon, maxEpsilon, minSteps, maxSteps, stepSizeFactor } = config.shield;
    const t = level / 100;
    const epsilon = minEpsilon + (maxEpsilon - minEpsilon) * t;
    const steps = Math.round(minSteps + (maxSteps - minSteps) * t);
    return { epsilon, steps, stepSize: (stepSizeFactor * epsilon) / steps, targetMode };
}

/**
 * Color view of a buffer for the model: `height * width * 3` floats in [0, 1].
 * Grayscale is replicated across the three channels; alpha is dropped.
 */
export function toModelRgb(buffer: PixelBuffer): Float32Array {
    const { channels } = buffer;
    const rgb = new Float32Array(buffer.pixelCount * 3);
    for (let p = 0; p < buffer.pixelCount; p++) {
        for (let c = 0; c < 3; c++) {
            rgb[p * 3 + c] = buffer.sampleAt(p * channels + (channels === 1 ? 0 : c)) / 255;
        }
    }
    return rgb;
}

export interface IOptimizeOptions {
    signal?: AbortSignal;
    onStep?: (step: number, objective: number) => void;
}

export interface IOptimizedPerturbation {
    delta: Float32Array;
    trace: number[];
}

function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new CancelledError('protect');
}

/**
 * Projected gradient-sign ascent in model space. Starts from a seeded uniform
 * point inside the epsilon ball; after every step the cumulative perturbation
 * is clamped to `[-epsilon, epsilon]` and `rgb + delta` to [0, 1].
 *
 * The loop yields to the event loop between steps and checks `signal` there.
 *
 * @param adapter - Differentiable feature extractor.
 * @param rgb - Clean image in model space, `height * width * 3` floats in [0, 1].
 * @param reference - Features of the clean image the objective moves away from.
 * @param spec - Budget, step count, step size and objective.
 * @param options - Cancellation signal and a per-step callback.
 * @return The final perturbation and the objective value before each step.
 *
 * @throws CancelledError once `signal` is aborted.
 */
export async function optimizePerturbation(
    adapter: FeatureExtractorAdapter,
    rgb: Float32Array,
    height: number,
    width: number,
    reference: IReferenceFeatures,
    spec: IPerturbationSpec,
    options: IOptimizeOptions = {},
): Promise<IOptimizedPerturbation> {
    const { epsilon, stepSize, steps, targetMode } = spec;
    const random = seedrandom(config.shield.seed);
    const delta = new Float32Array(rgb.length);
    for (let i = 0; i < delta.length; i++) {
        delta[i] = _.clamp(rgb[i] + (random() * 2 - 1) * epsilon, 0, 1) - rgb[i];
    }

    const adversarial = new Float32Array(rgb.length);
    const trace: number[] = [];
    for (let step = 0; step < steps; step++) {
        throwIfAborted(options.signal);
        for (let i = 0; i < rgb.length; i++) adversarial[i] = rgb[i] + delta[i];

        const { value, gradient } = adapter.objectiveGradient(adversarial, height, width, reference, targetMode);
        for (let i = 0; i < delta.length; i++) {
            const moved = _.clamp(delta[i] + stepSize * Math.sign(gradient[i]), -epsilon, epsilon);
            delta[i] = _.clamp(rgb[i] + moved, 0, 1) - rgb[i];
        }
        trace.push(value);
        options.onStep?.(step, value);

        await setImmediate();
    }
    throwIfAborted(options.signal);

    return { delta, trace };
}

/**
 * Sample-space shift for a budget: epsilon in 8-bit units, truncated to a
 * multiple of the preserved unit so the watermark's bit planes stay intact.
 */
export function quantizedShift(epsilon: number): number {
    return PRESERVED_UNIT * Math.floor((epsilon * 255) / PRESERVED_UNIT + 1e-9);
}

/**
 * Moves `value` by exactly `shift` with its low bits kept: towards `direction`
 * (up when it is 0), or the other way when that would leave [0, 255].
 */
function shiftSample(value: number, direction: number, shift: number): number {
    const low = value & PRESERVED_MASK;
    const base = value - low;
    const preferred = direction < 0 ? -shift : shift;
    const target = base + preferred;
    return (target < 0 || target > HIGHEST_BASE ? base - preferred : target) + low;
}

/**
 * Applies the direction of a model-space perturbation to the 8-bit samples.
 * Every color sample moves by exactly `quantizedShift(epsilon)` with its low
 * bits kept, following `sign(delta)` unless the sample sits too close to 0 or
 * 255, so the distortion of the result is the shift itself. Grayscale samples
 * follow the summed direction of their three model channels. Alpha is never
 * touched.
 *
 * @param buffer - Image to perturb; left unchanged.
 * @param delta - Model-space perturbation, `height * width * 3` floats.
 * @param epsilon - Budget in [0, 1] units; truncated by `quantizedShift`.
 * @return A new buffer holding the perturbed samples.
 */
export function projectPerturbation(buffer: PixelBuffer, delta: Float32Array, epsilon: number): PixelBuffer {
    const shift = quantizedShift(epsilon);
    return buffer.map((samples, info) => {
        if (shift === 0) return;
        const pixels = info.width * info.height;
        for (let p = 0; p < pixels; p++) {
            const base = p * info.channels;
            if (info.channels === 1) {
                const direction = Math.sign(delta[p * 3] + delta[p * 3 + 1] + delta[p * 3 + 2]);
                samples[base] = shiftSample(samples[base], direction, shift);
                continue;
            }
            for (let c = 0; c < 3; c++) {
                samples[base + c] = shiftSample(samples[base + c], Math.sign(delta[p * 3 + c]), shift);
            }
        }
    });
}

/**
 * Mean absolute difference over color samples, normalized to [0, 1].
 */
export function measureDistortion(original: PixelBuffer, perturbed: PixelBuffer): number {
    const { channels } = original;
    const colorChannels = original.colorChannels;
    let total = 0;
    for (let p = 0; p < original.pixelCount; p++) {
        for (let c = 0; c < colorChannels; c++) {
            const index = p * channels + c;
            total += Math.abs(perturbed.sampleAt(index) - original.sampleAt(index));
        }
    }
    return total / (original.pixelCount * colorChannels * 255);
}
