// src/core/imageProcessing/processor.ts

import type { ImageProcessor } from '../../@types/index.js';
import { InvalidImageError } from '../../errors/index.js';
import { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.js';

const defaultProcessor: ImageProcessor = new SharpImageProcessor();

/**
 * Decodes the image file at `imagePath` into a PixelBuffer.
 *
 * @param imagePath - Any format sharp can read.
 * @param processor - Decoder to use; sharp unless given.
 * @return Grayscale, RGB or RGBA samples; grayscale with alpha is widened to RGBA.
 *
 * @throws InvalidImageError if the file cannot be decoded.
 */
export async function loadImage(imagePath: string, processor: ImageProcessor = defaultProcessor): Promise<PixelBuffer> {
    const raw = await processor.loadImageData(imagePath).catch((error: unknown) => {
        if (error instanceof InvalidImageError) throw error;
        throw new InvalidImageError(`Failed to decode ${imagePath}: ${error instanceof Error ? error.message : String(error)}`);
    });
    return PixelBuffer.fromRaw(raw);
}

/**
 * Encodes `buffer` as PNG at `outputPngPath`.
 */
export async function writeImage(
    buffer: PixelBuffer,
    outputPngPath: string,
    processor: ImageProcessor = defaultProcessor,
): Promise<void> {
    await processor.writeImageData(buffer.toRaw(), outputPngPath);
}

/**
 * Re-encodes an encoded image without its metadata.
 */
export async function stripMetadata(input: Uint8Array, processor: ImageProcessor = defaultProcessor): Promise<Uint8Array> {
    if (input.length === 0) throw new InvalidImageError('Image data is empty.');
    return processor.stripMetadata(input);
}
