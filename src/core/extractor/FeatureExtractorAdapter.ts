// src/core/extractor/FeatureExtractorAdapter.ts

import type { IObjectiveStep, IReferenceFeatures, IVisionModel, TargetMode } from '../../@types/index.js';
import { config } from '../../config/index.js';
import * as tf from '@tensorflow/tfjs';

/**
 * Differentiable view of a vision model over model-space RGB images
 * (`height * width * 3` floats in [0, 1]). Images are resized to the model's
 * input resolution on the way in; gradients are resized back on the way out.
 *
 * All tensors live inside `tf.tidy` scopes; callers only ever see typed arrays.
 */
export class FeatureExtractorAdapter {
    constructor(readonly model: IVisionModel) {}

    get name(): string {
        return this.model.name;
    }

    get inputShape(): readonly [number, number] {
        return this.model.inputShape;
    }

    /**
     * Embedding and top class of the clean image, the fixed point the objectives move away from.
     */
    reference(rgb: Float32Array, height: number, width: number): IReferenceFeatures {
        const [embedding, topClass] = tf.tidy((): [tf.Tensor2D, tf.Tensor1D] => {
            const output = this.model.forward(this.toModelInput(rgb, height, width));
            return [output.embedding, tf.argMax<tf.Tensor1D>(output.logits, 1)];
        });
        try {
            return {
                embedding: Float32Array.from(embedding.dataSync<'float32'>()),
                topClass: topClass.dataSync()[0],
            };
        } finally {
            tf.dispose([embedding, topClass]);
        }
    }

    /**
     * Objective value at `rgb` and its gradient with respect to every sample of
     * `rgb`: taken at the model's input resolution, then resized bilinearly.
     */
    objectiveGradient(
        rgb: Float32Array,
        height: number,
        width: number,
        reference: IReferenceFeatures,
        mode: TargetMode,
    ): IObjectiveStep {
        const [value, gradient] = tf.tidy((): [tf.Scalar, tf.Tensor4D] => {
            const objective = (input: tf.Tensor4D): tf.Scalar => this.objective(input, reference, mode);
            const { value, grad } = tf.valueAndGrad(objective)(this.toModelInput(rgb, height, width));
            return [value, tf.image.resizeBilinear(grad, [height, width])];
        });
        try {
            return {
                value: value.dataSync()[0],
                gradient: Float32Array.from(gradient.dataSync<'float32'>()),
            };
        } finally {
            tf.dispose([value, gradient]);
        }
    }

    /**
     * Relative embedding shift caused by a small box blur (feature squeezing):
     * `||e(x) - e(blur(x))||^2 / ||e(blur(x))||^2`.
     */
    squeezeDivergence(rgb: Float32Array, height: number, width: number): number {
        const divergence = tf.tidy((): tf.Scalar => {
            const input = this.toModelInput(rgb, height, width);
            const squeezed = tf.avgPool(input, config.robustness.squeezeKernel, 1, 'same');
            const original = this.model.forward(input).embedding;
            const reference = this.model.forward(squeezed).embedding;
            const shift = tf.sum<tf.Scalar>(tf.squaredDifference(original, reference));
            const norm = tf.sum<tf.Scalar>(tf.square(reference));
            return tf.div<tf.Scalar>(shift, tf.maximum(norm, 1e-12));
        });
        try {
            return divergence.dataSync()[0];
        } finally {
            divergence.dispose();
        }
    }

    dispose(): void {
        this.model.dispose();
    }

    private objective(input: tf.Tensor4D, reference: IReferenceFeatures, mode: TargetMode): tf.Scalar {
        const { embedding, logits } = this.model.forward(input);
        if (mode === 'embedding') {
            const anchor = tf.tensor2d(reference.embedding, [1, reference.embedding.length]);
            return tf.sum<tf.Scalar>(tf.squaredDifference(embedding, anchor));
        }
        // Cross entropy against the clean top class
        const logProbabilities = tf.logSoftmax(logits);
        return tf.neg(tf.sum<tf.Scalar>(tf.slice(logProbabilities, [0, reference.topClass], [1, 1])));
    }

    private toModelInput(rgb: Float32Array, height: number, width: number): tf.Tensor4D {
        const image = tf.tensor4d(rgb, [1, height, width, 3]);
        const [inputHeight, inputWidth] = this.model.inputShape;
        if (height === inputHeight && width === inputWidth) return image;
        return tf.image.resizeBilinear(image, [inputHeight, inputWidth]);
    }
}
