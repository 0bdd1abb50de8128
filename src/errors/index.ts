// src/errors/index.ts

export type PngProtectErrorCode =
    | 'CAPACITY'
    | 'MODEL_UNAVAILABLE'
    | 'INVALID_IMAGE'
    | 'CANCELLED'
    | 'INVALID_PAYLOAD';

export class PngProtectError extends Error {
    constructor(
        message: string,
        readonly code: PngProtectErrorCode,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The image cannot hold a single copy of the payload at the requested strength.
 */
export class CapacityError extends PngProtectError {
    constructor(
        readonly requiredBits: number,
        readonly availableBits: number,
        readonly minimumSide: number,
    ) {
        super(
            `Image too small for watermark: need ${requiredBits} bits but only ${availableBits} are available ` +
                `(at least ${minimumSide}x${minimumSide} pixels required at this strength).`,
            'CAPACITY',
        );
    }
}

export class ModelUnavailableError extends PngProtectError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'MODEL_UNAVAILABLE', options);
    }
}

export class InvalidImageError extends PngProtectError {
    constructor(message: string) {
        super(message, 'INVALID_IMAGE');
    }
}

export class CancelledError extends PngProtectError {
    constructor(operation: string) {
        super(`${operation} was cancelled.`, 'CANCELLED');
    }
}

export class WatermarkPayloadError extends PngProtectError {
    constructor(message: string) {
        super(message, 'INVALID_PAYLOAD');
    }
}
