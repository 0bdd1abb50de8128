// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { ImageProcessor, IRawImage } from '../../../@types/index.js';
import { config } from '../../../config/index.js';
import { InvalidImageError } from '../../../errors/index.js';
import { validateImageInfo } from '../../pixelBuffer/PixelBuffer.js';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image file into 8-bit interleaved samples. Grayscale, RGB and
     * RGBA layouts are kept as they are; grayscale with alpha becomes RGBA.
     */
    public async loadImageData(imagePath: string): Promise<IRawImage> {
        let { data, info } = await sharp(imagePath).raw().toBuffer({ resolveWithObject: true });
        if (info.channels === 2) {
            ({ data, info } = await sharp(imagePath).toColourspace('srgb').ensureAlpha().raw().toBuffer({
                resolveWithObject: true,
            }));
        }
        const { width, height, channels } = validateImageInfo(info);
        return { width, height, channels, data: new Uint8Array(data) };
    }

    /**
     * Writes interleaved samples to a lossless PNG file.
     */
    public async writeImageData(image: IRawImage, outputPngPath: string): Promise<void> {
        await sharp(image.data, {
            raw: {
                width: image.width,
                height: image.height,
                channels: image.channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toFile(outputPngPath);
    }

    /**
     * Re-encodes an encoded image in its own format without EXIF, ICC, XMP or
     * any other metadata.
     */
    public async stripMetadata(input: Uint8Array): Promise<Uint8Array> {
        const { format } = await sharp(input).metadata();
        if (!format) {
            throw new InvalidImageError('Cannot determine the image format to re-encode.');
        }
        const image = sharp(input);
        const encoded =
            format === 'png'
                ? image.png({ compressionLevel: config.imageCompression.compressionLevel, palette: false })
                : image.toFormat(format);
        return new Uint8Array(await encoded.toBuffer());
    }
}
