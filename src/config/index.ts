// src/config/index.ts

import process from 'node:process';

/**
 * "PNPW": leading marker of every serialized watermark copy.
 */
export const WATERMARK_MAGIC = Uint8Array.from([0x50, 0x4e, 0x50, 0x57]);

export const config = {
    imageCompression: {
        compressionLevel: 9,
        adaptiveFiltering: false,
    },
    watermark: {
        minStrength: 1,
        maxStrength: 10,
        maxBitsPerSample: 3, // Highest bit plane any strength writes into
        maxOwnerIdBytes: 1024,
    },
    shield: {
        minEpsilon: 8 / 255,
        maxEpsilon: 32 / 255,
        minSteps: 2,
        maxSteps: 10,
        stepSizeFactor: 2.5, // step = factor * epsilon / steps
        maxDistortion: 0.1, // mean absolute sample delta, normalized
        targetMode: 'untargeted' as const,
        seed: 'pngprotect-shield',
    },
    extractor: {
        inputSize: 64,
        featureChannels: 8,
        classes: 10,
        seed: 1337,
        mean: [0.485, 0.456, 0.406] as const,
        std: [0.229, 0.224, 0.225] as const,
        modelDirectory: process.env.PNGPROTECT_MODEL_DIR ?? null,
    },
    robustness: {
        squeezeKernel: 3,
        referenceDivergence: 0.01,
    },
    forensics: {
        weights: {
            lsb: 0.4,
            watermark: 0.4,
            recompression: 0.2,
        },
        lsbDisturbanceThreshold: 0.01,
        lsbFlattenedThreshold: 0.02,
        blockSize: 8,
        recompressionRatioThreshold: 1.25,
        recompressionRatioCeiling: 2,
    },
};
