// src/index.ts

export * from './@types/index.js';
export { config, WATERMARK_MAGIC } from './config/index.js';
export {
    CancelledError,
    CapacityError,
    InvalidImageError,
    ModelUnavailableError,
    PngProtectError,
    WatermarkPayloadError,
} from './errors/index.js';
export type { PngProtectErrorCode } from './errors/index.js';
export { PixelBuffer, validateImageInfo } from './core/pixelBuffer/PixelBuffer.js';
export {
    BIT_PLANS,
    PAYLOAD_OVERHEAD_BYTES,
    SUPPORTED_STRENGTHS,
    WatermarkPayload,
    computeCapacity,
    embed,
    extract,
    getBitPlan,
    isWatermarkStrength,
    majorityVote,
    maxOwnerIdBytes,
    scanWatermark,
} from './core/watermark/index.js';
export { levelToSpec, protect, quantizedShift, score, shieldProgressTotal } from './core/shield/index.js';
export { analyze } from './core/forensics/index.js';
export {
    FeatureExtractorAdapter,
    FeatureExtractorRegistry,
    SeededConvNetModel,
    defaultModelLoader,
    getDefaultRegistry,
    loadLayersModelFromDirectory,
    shutdownDefaultRegistry,
    withExtractor,
} from './core/extractor/index.js';
export type { ILayersModelOptions, ISeededConvNetOptions } from './core/extractor/index.js';
export { loadImage, stripMetadata, writeImage } from './core/imageProcessing/processor.js';
export { SharpImageProcessor } from './core/imageProcessing/strategies/SharpImageProcessor.js';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.js';
