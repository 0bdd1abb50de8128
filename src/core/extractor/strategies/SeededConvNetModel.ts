// src/core/extractor/strategies/SeededConvNetModel.ts

import type { IModelOutput, IVisionModel } from '../../../@types/index.js';
import { config } from '../../../config/index.js';
import * as tf from '@tensorflow/tfjs';

export interface ISeededConvNetOptions {
    inputSize?: number;
    featureChannels?: number;
    classes?: number;
    seed?: number;
}

/**
 * Small fixed-weight convolutional network used when no pretrained model is
 * configured. Weights are drawn once from seeded normal initializers, so every
 * process computes the same features for the same input.
 *
 * conv3x3 -> tanh -> conv3x3 (stride 2) -> tanh -> flatten (embedding) -> dense (logits)
 */
export class SeededConvNetModel implements IVisionModel {
    readonly name = 'seeded-convnet';
    readonly inputShape: readonly [number, number];

    private readonly mean: tf.Tensor1D;
    private readonly std: tf.Tensor1D;
    private readonly conv1: tf.Tensor4D;
    private readonly conv2: tf.Tensor4D;
    private readonly dense: tf.Tensor2D;
    private disposed = false;

    constructor(options: ISeededConvNetOptions = {}) {
        const inputSize = options.inputSize ?? config.extractor.inputSize;
        const channels = options.featureChannels ?? config.extractor.featureChannels;
        const classes = options.classes ?? config.extractor.classes;
        const seed = options.seed ?? config.extractor.seed;

        this.inputShape = [inputSize, inputSize];
        const embeddingSize = Math.ceil(inputSize / 2) ** 2 * channels;

        this.mean = tf.tensor1d([...config.extractor.mean]);
        this.std = tf.tensor1d([...config.extractor.std]);
        this.conv1 = tf.randomNormal<tf.Rank.R4>([3, 3, 3, channels], 0, 1 / Math.sqrt(27), 'float32', seed);
        this.conv2 = tf.randomNormal<tf.Rank.R4>(
            [3, 3, channels, channels],
            0,
            1 / Math.sqrt(9 * channels),
            'float32',
            seed + 1,
        );
        this.dense = tf.randomNormal<tf.Rank.R2>([embeddingSize, classes], 0, 1 / Math.sqrt(embeddingSize), 'float32', seed + 2);
    }

    forward(input: tf.Tensor4D): IModelOutput {
        const normalized = tf.div<tf.Tensor4D>(tf.sub<tf.Tensor4D>(input, this.mean), this.std);
        const hidden = tf.tanh(tf.conv2d(normalized, this.conv1, 1, 'same'));
        const features = tf.tanh(tf.conv2d(hidden, this.conv2, 2, 'same'));
        const embedding = tf.reshape<tf.Rank.R2>(features, [features.shape[0], -1]);
        return { embedding, logits: tf.matMul(embedding, this.dense) };
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        tf.dispose([this.mean, this.std, this.conv1, this.conv2, this.dense]);
    }
}
