// src/core/pixelBuffer/PixelBuffer.ts

import type { ChannelCount, IImageInfo, ImageInput, IRawImage } from '../../@types/index.js';
import { InvalidImageError } from '../../errors/index.js';
import _ from 'lodash';

const SUPPORTED_CHANNELS: readonly number[] = [1, 3, 4];

function isChannelCount(value: number): value is ChannelCount {
    return SUPPORTED_CHANNELS.includes(value);
}

/**
 * Validates image dimensions and returns them with a narrowed channel count.
 *
 * @throws InvalidImageError on zero-size, fractional or unsupported layouts.
 */
export function validateImageInfo(info: { width: number; height: number; channels: number }): IImageInfo {
    const { width, height, channels } = info;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new InvalidImageError(`Image dimensions must be positive integers, got ${width}x${height}.`);
    }
    if (!isChannelCount(channels)) {
        throw new InvalidImageError(`Unsupported channel count ${channels}; expected 1, 3 or 4.`);
    }
    return { width, height, channels };
}

/**
 * Dense height x width x channels grid of 8-bit samples, interleaved and row-major.
 * The float view maps every sample to `v / 255`.
 *
 * Instances never expose their backing array; engines derive new buffers
 * instead of mutating one they were given.
 */
export class PixelBuffer implements IImageInfo {
    private constructor(
        readonly width: number,
        readonly height: number,
        readonly channels: ChannelCount,
        private readonly samples: Uint8Array,
    ) {}

    /**
     * Builds a buffer from raw interleaved samples. The data is copied.
     */
    static fromRaw(image: IRawImage): PixelBuffer {
        if (!image.data || image.data.length === 0) {
            throw new InvalidImageError('Image data is empty.');
        }
        const info = validateImageInfo(image);
        const expected = info.width * info.height * info.channels;
        if (image.data.length !== expected) {
            throw new InvalidImageError(
                `Image data holds ${image.data.length} samples but ${info.width}x${info.height}x${info.channels} needs ${expected}.`,
            );
        }
        return new PixelBuffer(info.width, info.height, info.channels, Uint8Array.from(image.data));
    }

    /**
     * Quantizes a float view back to 8-bit samples: `round(clamp(v, 0, 1) * 255)`.
     */
    static fromFloat32(data: Float32Array, info: IImageInfo): PixelBuffer {
        const validated = validateImageInfo(info);
        const expected = validated.width * validated.height * validated.channels;
        if (data.length !== expected) {
            throw new InvalidImageError(`Float view holds ${data.length} samples, expected ${expected}.`);
        }
        const samples = new Uint8Array(expected);
        for (let i = 0; i < expected; i++) {
            samples[i] = Math.round(_.clamp(data[i], 0, 1) * 255);
        }
        return new PixelBuffer(validated.width, validated.height, validated.channels, samples);
    }

    /**
     * Normalizes any accepted image input into a validated buffer.
     */
    static from(input: ImageInput): PixelBuffer {
        return input instanceof PixelBuffer ? input : PixelBuffer.fromRaw(input);
    }

    get pixelCount(): number {
        return this.width * this.height;
    }

    get sampleCount(): number {
        return this.samples.length;
    }

    /**
     * Number of color (non-alpha) channels.
     */
    get colorChannels(): 1 | 3 {
        return this.channels === 1 ? 1 : 3;
    }

    get info(): IImageInfo {
        return { width: this.width, height: this.height, channels: this.channels };
    }

    sampleAt(index: number): number {
        return this.samples[index];
    }

    /**
     * Copy of the interleaved samples.
     */
    toUint8Array(): Uint8Array {
        return Uint8Array.from(this.samples);
    }

    toRaw(): IRawImage {
        return { ...this.info, data: this.toUint8Array() };
    }

    toFloat32(): Float32Array {
        const view = new Float32Array(this.samples.length);
        for (let i = 0; i < view.length; i++) {
            view[i] = this.samples[i] / 255;
        }
        return view;
    }

    /**
     * Returns a new buffer with the same layout whose samples were rewritten by `mutate`.
     * `mutate` receives a private copy of the samples.
     */
    map(mutate: (samples: Uint8Array, info: IImageInfo) => void): PixelBuffer {
        const copy = this.toUint8Array();
        mutate(copy, this.info);
        return new PixelBuffer(this.width, this.height, this.channels, copy);
    }

    clone(): PixelBuffer {
        return new PixelBuffer(this.width, this.height, this.channels, this.toUint8Array());
    }

    equals(other: PixelBuffer): boolean {
        if (other.width !== this.width || other.height !== this.height || other.channels !== this.channels) {
            return false;
        }
        for (let i = 0; i < this.samples.length; i++) {
            if (this.samples[i] !== other.samples[i]) return false;
        }
        return true;
    }
}
