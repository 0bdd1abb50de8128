// src/core/extractor/strategies/LayersModelBackend.ts

import type { IModelOutput, IVisionModel } from '../../../@types/index.js';
import { ModelUnavailableError } from '../../../errors/index.js';
import * as tf from '@tensorflow/tfjs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

export interface ILayersModelOptions {
    /** Layer whose output serves as the embedding; the penultimate layer when omitted. */
    embeddingLayer?: string;
}

interface IWeightsGroup {
    paths: string[];
    weights: tf.io.WeightsManifestEntry[];
}

const WEIGHT_DTYPES: readonly string[] = ['float32', 'int32', 'bool', 'string', 'complex64'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWeightsManifestEntry(value: unknown): value is tf.io.WeightsManifestEntry {
    return (
        isRecord(value) &&
        typeof value.name === 'string' &&
        Array.isArray(value.shape) &&
        value.shape.every((dim) => typeof dim === 'number') &&
        typeof value.dtype === 'string' &&
        WEIGHT_DTYPES.includes(value.dtype)
    );
}

function isWeightsGroup(value: unknown): value is IWeightsGroup {
    return (
        isRecord(value) &&
        Array.isArray(value.paths) &&
        value.paths.every((p) => typeof p === 'string') &&
        Array.isArray(value.weights) &&
        value.weights.every(isWeightsManifestEntry)
    );
}

/**
 * Reads `model.json` and its weight shards from `directory` into in-memory model artifacts.
 */
async function readModelArtifacts(directory: string): Promise<tf.io.ModelArtifacts> {
    const manifestPath = path.join(directory, 'model.json');
    const manifest: unknown = JSON.parse(await readFile(manifestPath, 'utf-8'));
    if (!isRecord(manifest) || !isRecord(manifest.modelTopology)) {
        throw new ModelUnavailableError(`${manifestPath} carries no layers model topology.`);
    }
    const groups = manifest.weightsManifest;
    if (!Array.isArray(groups) || !groups.every(isWeightsGroup)) {
        throw new ModelUnavailableError(`${manifestPath} has a malformed weights manifest.`);
    }

    const shards: Uint8Array[] = [];
    for (const group of groups) {
        for (const shardPath of group.paths) {
            shards.push(await readFile(path.join(directory, shardPath)));
        }
    }
    const weightData = new ArrayBuffer(shards.reduce((acc, shard) => acc + shard.length, 0));
    const view = new Uint8Array(weightData);
    let offset = 0;
    for (const shard of shards) {
        view.set(shard, offset);
        offset += shard.length;
    }

    return {
        modelTopology: manifest.modelTopology,
        weightSpecs: groups.flatMap((group) => group.weights),
        weightData,
    };
}

/**
 * Wraps a loaded layers model so that one call yields both the embedding layer's
 * output and the final logits.
 */
class LayersModelBackend implements IVisionModel {
    constructor(
        readonly name: string,
        readonly inputShape: readonly [number, number],
        private readonly model: tf.LayersModel,
        private readonly heads: tf.LayersModel,
    ) {}

    forward(input: tf.Tensor4D): IModelOutput {
        const outputs = this.heads.predict(input);
        if (!Array.isArray(outputs) || outputs.length !== 2) {
            throw new ModelUnavailableError(`${this.name} did not produce embedding and logits outputs.`);
        }
        const [embedding, logits] = outputs;
        return {
            embedding: tf.reshape<tf.Rank.R2>(embedding, [embedding.shape[0], -1]),
            logits: tf.reshape<tf.Rank.R2>(logits, [logits.shape[0], -1]),
        };
    }

    dispose(): void {
        this.model.dispose();
    }
}

/**
 * Loads a pretrained TensorFlow.js layers model saved as `model.json` plus
 * binary weight shards. The model receives RGB input in [0, 1] at the height
 * and width of its input layer.
 *
 * @throws ModelUnavailableError if the files are missing or malformed, or the
 * model lacks a usable image input or embedding layer.
 */
export async function loadLayersModelFromDirectory(
    directory: string,
    options: ILayersModelOptions = {},
): Promise<IVisionModel> {
    const artifacts = await readModelArtifacts(directory);
    const model = await tf.loadLayersModel(tf.io.fromMemory(artifacts));

    try {
        const [, height, width, channels] = model.inputs[0].shape;
        if (typeof height !== 'number' || typeof width !== 'number' || channels !== 3) {
            throw new ModelUnavailableError(
                `Model input shape [${model.inputs[0].shape.join(', ')}] is not a fixed-size RGB image.`,
            );
        }

        const embeddingLayer = options.embeddingLayer
            ? model.getLayer(options.embeddingLayer)
            : model.layers[model.layers.length - 2];
        if (!embeddingLayer) {
            throw new ModelUnavailableError('Model has no layer to take the embedding from.');
        }
        const embeddingOutput = embeddingLayer.output;
        if (Array.isArray(embeddingOutput)) {
            throw new ModelUnavailableError(`Layer ${embeddingLayer.name} has more than one output.`);
        }

        const heads = tf.model({ inputs: model.inputs, outputs: [embeddingOutput, model.outputs[0]] });
        return new LayersModelBackend(`layers:${path.basename(directory)}`, [height, width], model, heads);
    } catch (error) {
        model.dispose();
        throw error;
    }
}
