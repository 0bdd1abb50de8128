// src/core/extractor/index.ts

export { FeatureExtractorAdapter } from './FeatureExtractorAdapter.js';
export {
    FeatureExtractorRegistry,
    defaultModelLoader,
    getDefaultRegistry,
    shutdownDefaultRegistry,
    withExtractor,
} from './registry.js';
export { SeededConvNetModel } from './strategies/SeededConvNetModel.js';
export type { ISeededConvNetOptions } from './strategies/SeededConvNetModel.js';
export { loadLayersModelFromDirectory } from './strategies/LayersModelBackend.js';
export type { ILayersModelOptions } from './strategies/LayersModelBackend.js';
