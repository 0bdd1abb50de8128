// tests/watermark.test.ts

import { describe, expect, it } from 'vitest';

import type { WatermarkStrength } from '../src/@types/index.js';
import { CapacityError, InvalidImageError, WatermarkPayloadError } from '../src/errors/index.js';
import { PixelBuffer } from '../src/core/pixelBuffer/PixelBuffer.js';
import {
    SUPPORTED_STRENGTHS,
    WatermarkPayload,
    computeCapacity,
    embed,
    extract,
    majorityVote,
    maxOwnerIdBytes,
    scanWatermark,
} from '../src/core/watermark/index.js';
import { createSmoothImage, flipLsbs } from './helpers/imageFactory.js';
import { MockLogger } from './helpers/mockLogger.js';

const logger = new MockLogger();

describe('WatermarkPayload', () => {
    it('should serialize magic, length, owner id and checksum', () => {
        const payload = WatermarkPayload.create('artist-42');
        const bytes = payload.toBytes();
        expect(payload.byteLength).toBe(16);
        expect(payload.bitLength).toBe(128);
        expect(Array.from(bytes.subarray(0, 6))).toEqual([0x50, 0x4e, 0x50, 0x57, 0x00, 0x09]);
        expect(new TextDecoder().decode(bytes.subarray(6, 15))).toBe('artist-42');
        expect(bytes[15]).toBe(payload.checksum);
    });

    it('should decode a serialized copy', () => {
        const decoded = WatermarkPayload.decode(WatermarkPayload.create('artist-42').toBytes());
        expect(decoded?.ownerId).toBe('artist-42');
    });

    it('should reject a copy with a damaged byte', () => {
        const bytes = WatermarkPayload.create('artist-42').toBytes();
        bytes[8] ^= 0x01;
        expect(WatermarkPayload.decode(bytes)).toBeNull();
    });

    it('should reject empty and oversized owner ids', () => {
        expect(() => WatermarkPayload.create('')).toThrow(WatermarkPayloadError);
        expect(() => WatermarkPayload.create('x'.repeat(1025))).toThrow(WatermarkPayloadError);
    });
});

describe('Watermark codec', () => {
    describe('round trip', () => {
        it.each(SUPPORTED_STRENGTHS)('should recover the owner id at strength %i', (strength) => {
            const image = createSmoothImage(32, 32, 3, `round-trip-${strength}`);
            const embedded = embed(image, 'artist-42', strength, { logger });
            const result = extract(embedded.image, { logger });

            expect(result.validity).toBe('valid');
            expect(result.payload?.ownerId).toBe('artist-42');
            expect(result.strength).toBe(strength);
            expect(result.partialRecovery).toBe(false);
            expect(result.confidence).toBe(1);
        });

        it('should round-trip on RGBA and grayscale images', () => {
            const rgba = embed(createSmoothImage(24, 24, 4), 'owner-rgba', 10, { logger });
            expect(extract(rgba.image, { logger }).payload?.ownerId).toBe('owner-rgba');

            const gray = embed(createSmoothImage(32, 32, 1), 'owner-gray', 6, { logger });
            expect(extract(gray.image, { logger }).payload?.ownerId).toBe('owner-gray');
        });

        it('should report the lowest strength sharing the embedded layout', () => {
            // Strengths 1-3 all write one bit per grayscale sample
            const gray = embed(createSmoothImage(32, 32, 1), 'artist-42', 3, { logger });
            expect(extract(gray.image, { logger }).strength).toBe(1);
        });

        it('should recover multi-byte UTF-8 owner ids', () => {
            const embedded = embed(createSmoothImage(32, 32, 3), 'künstlerin-☀', 4, { logger });
            expect(extract(embedded.image, { logger }).payload?.ownerId).toBe('künstlerin-☀');
        });
    });

    it('should describe the embedding', () => {
        const result = embed(createSmoothImage(64, 64, 3), 'artist-42', 3, { logger });
        expect(result.strength).toBe(3);
        expect(result.bitsPerSample).toBe(1);
        expect(result.capacityBits).toBe(12288);
        expect(result.payloadBits).toBe(128);
        expect(result.copies).toBe(96);
        expect(result.utilization).toBe(128 / 12288);
    });

    it('should not mutate the input image', () => {
        const image = createSmoothImage(32, 32, 3);
        const before = image.clone();
        embed(image, 'artist-42', 7, { logger });
        expect(image.equals(before)).toBe(true);
    });

    describe('capacity', () => {
        it('should grow strictly with strength for 3 and 4 channel images', () => {
            expect(SUPPORTED_STRENGTHS.map((s) => computeCapacity({ width: 16, height: 16, channels: 3 }, s))).toEqual([
                256, 512, 768, 1024, 1280, 1536, 1792, 2048, 2176, 2304,
            ]);
            for (const channels of [3, 4] as const) {
                const lengths = SUPPORTED_STRENGTHS.map((s) => maxOwnerIdBytes({ width: 16, height: 16, channels }, s));
                for (let i = 1; i < lengths.length; i++) {
                    expect(lengths[i]).toBeGreaterThan(lengths[i - 1]);
                }
            }
        });

        it('should saturate at three bits per sample for grayscale', () => {
            expect(SUPPORTED_STRENGTHS.map((s) => computeCapacity({ width: 1, height: 1, channels: 1 }, s))).toEqual([
                1, 1, 1, 2, 2, 2, 3, 3, 3, 3,
            ]);
        });

        it('should report the longest owner id that fits', () => {
            expect(maxOwnerIdBytes({ width: 16, height: 16, channels: 3 }, 1)).toBe(25);
            expect(maxOwnerIdBytes({ width: 2, height: 2, channels: 3 }, 1)).toBe(0);
        });
    });

    it('should overwrite an earlier watermark at the same strength', () => {
        const first = embed(createSmoothImage(48, 48, 3), 'first-owner', 5, { logger });
        const second = embed(first.image, 'second-owner', 5, { logger });
        expect(extract(second.image, { logger }).payload?.ownerId).toBe('second-owner');
    });

    it('should fail with CapacityError on a 1x1 image', () => {
        const tiny = { width: 1, height: 1, channels: 3 as const, data: Uint8Array.of(1, 2, 3) };
        try {
            embed(tiny, 'artist-42', 1, { logger });
            expect.unreachable('embed should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(CapacityError);
            if (error instanceof CapacityError) {
                expect(error.requiredBits).toBe(128);
                expect(error.availableBits).toBe(1);
                expect(error.minimumSide).toBe(12);
            }
        }
    });

    it('should reject unsupported strengths', () => {
        const image = createSmoothImage(16, 16, 3);
        for (const strength of [0, 11, 2.5]) {
            expect(() => embed(image, 'artist-42', strength, { logger })).toThrow(RangeError);
        }
    });

    it('should reject empty input', () => {
        const empty = { width: 0, height: 0, channels: 3 as const, data: new Uint8Array(0) };
        expect(() => embed(empty, 'artist-42', 1, { logger })).toThrow(InvalidImageError);
        expect(() => extract(empty, { logger })).toThrow(InvalidImageError);
    });

    describe('extraction outcomes', () => {
        it('should report not_found on an unmarked image', () => {
            const result = extract(createSmoothImage(32, 32, 3), { logger });
            expect(result).toEqual({
                payload: null,
                validity: 'not_found',
                strength: null,
                copiesFound: 0,
                validCopies: 0,
                partialRecovery: false,
                confidence: 0,
            });
        });

        it('should report corrupted when the only copy fails its checksum', () => {
            // 8x8 RGB at strength 1 holds exactly one 64-bit copy of a one-byte owner id
            const embedded = embed(createSmoothImage(8, 8, 3), 'a', 1, { logger });
            expect(embedded.copies).toBe(1);

            // Stream bit 48 (first owner-id bit) lives in the red sample of pixel 48
            const damaged = flipLsbs(embedded.image, 48 * 3, 48 * 3 + 1);
            const result = extract(damaged, { logger });
            expect(result.validity).toBe('corrupted');
            expect(result.payload).toBeNull();
            expect(result.strength).toBe(1);
            expect(result.copiesFound).toBe(1);
            expect(result.validCopies).toBe(0);
        });

        it('should repair a damaged copy by majority vote', () => {
            const embedded = embed(createSmoothImage(64, 64, 3), 'artist-42', 3, { logger });
            // At strength 3 on RGB, stream bit k is the LSB of sample k
            const damaged = flipLsbs(embedded.image, 48, 49);
            const result = scanWatermark(damaged, { logger });

            expect(result.validity).toBe('valid');
            expect(result.payload?.ownerId).toBe('artist-42');
            expect(result.copiesFound).toBe(96);
            expect(result.validCopies).toBe(95);
            expect(result.partialRecovery).toBe(true);
            expect(result.confidence).toBe(95 / 96);
            expect(result.copyBits).toBe(128);
            expect(result.bitDisagreement).toBe(1 / (96 * 128));
        });

        it('should tolerate whole rows cropped from the top', () => {
            const embedded = embed(createSmoothImage(64, 64, 3), 'artist-42', 3, { logger });
            const cropped = PixelBuffer.fromRaw({
                width: 64,
                height: 61,
                channels: 3,
                data: embedded.image.toUint8Array().subarray(3 * 64 * 3),
            });
            const result = extract(cropped, { logger });

            expect(result.validity).toBe('valid');
            expect(result.payload?.ownerId).toBe('artist-42');
            expect(result.copiesFound).toBe(91);
        });
    });

    describe('majorityVote', () => {
        it('should take the most common value per byte', () => {
            const copies = [Uint8Array.of(1, 2, 3), Uint8Array.of(1, 9, 3), Uint8Array.of(1, 2, 7)];
            expect(Array.from(majorityVote(copies))).toEqual([1, 2, 3]);
        });

        it('should keep the first value on ties', () => {
            expect(Array.from(majorityVote([Uint8Array.of(5), Uint8Array.of(6)]))).toEqual([5]);
        });
    });
});

describe('Strength typing', () => {
    it('should expose all ten strengths in order', () => {
        const expected: WatermarkStrength[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
        expect(SUPPORTED_STRENGTHS).toEqual(expected);
    });
});
