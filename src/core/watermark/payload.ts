// src/core/watermark/payload.ts

import { config, WATERMARK_MAGIC } from '../../config/index.js';
import { WatermarkPayloadError } from '../../errors/index.js';
import { crc8 } from '../../utils/checksum/crc8.js';
import { concatUint8Arrays } from '../../utils/misc/helpers.js';
import { deserializeUInt16, serializeUInt16 } from '../../utils/serialization/serializationHelpers.js';

/** Magic, 16-bit length and trailing CRC-8. */
export const PAYLOAD_OVERHEAD_BYTES = WATERMARK_MAGIC.length + 2 + 1;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Serialized owner identifier: `magic | uint16 length | utf-8 owner id | crc8`.
 */
export class WatermarkPayload {
    private readonly bytes: Uint8Array;

    private constructor(
        readonly ownerId: string,
        bytes: Uint8Array,
    ) {
        this.bytes = bytes;
        Object.freeze(this);
    }

    /**
     * @throws WatermarkPayloadError for an empty owner id or one longer than the configured bound.
     */
    static create(ownerId: string): WatermarkPayload {
        const ownerBytes = utf8Encoder.encode(ownerId);
        if (ownerBytes.length === 0) {
            throw new WatermarkPayloadError('Owner id must not be empty.');
        }
        if (ownerBytes.length > config.watermark.maxOwnerIdBytes) {
            throw new WatermarkPayloadError(
                `Owner id is ${ownerBytes.length} bytes; at most ${config.watermark.maxOwnerIdBytes} are allowed.`,
            );
        }
        const body = concatUint8Arrays([WATERMARK_MAGIC, serializeUInt16(ownerBytes.length), ownerBytes]);
        const bytes = concatUint8Arrays([body, Uint8Array.of(crc8(body))]);
        return new WatermarkPayload(ownerId, bytes);
    }

    /**
     * Parses one serialized copy. Returns null unless magic, length, checksum
     * and UTF-8 decoding all hold.
     */
    static decode(bytes: Uint8Array): WatermarkPayload | null {
        if (bytes.length < PAYLOAD_OVERHEAD_BYTES + 1) return null;
        for (let i = 0; i < WATERMARK_MAGIC.length; i++) {
            if (bytes[i] !== WATERMARK_MAGIC[i]) return null;
        }
        const { value: ownerLength, newOffset } = deserializeUInt16(bytes, WATERMARK_MAGIC.length);
        if (ownerLength === 0 || newOffset + ownerLength + 1 !== bytes.length) return null;

        const checksumOffset = bytes.length - 1;
        if (crc8(bytes.subarray(0, checksumOffset)) !== bytes[checksumOffset]) return null;

        try {
            const ownerId = utf8Decoder.decode(bytes.subarray(newOffset, checksumOffset));
            return new WatermarkPayload(ownerId, Uint8Array.from(bytes));
        } catch {
            // Checksum collisions on mangled text are rejected like any bad copy
            return null;
        }
    }

    /**
     * Total serialized length for an owner id of `ownerIdBytes` bytes.
     */
    static serializedLength(ownerIdBytes: number): number {
        return PAYLOAD_OVERHEAD_BYTES + ownerIdBytes;
    }

    get byteLength(): number {
        return this.bytes.length;
    }

    get bitLength(): number {
        return this.bytes.length * 8;
    }

    get checksum(): number {
        return this.bytes[this.bytes.length - 1];
    }

    toBytes(): Uint8Array {
        return Uint8Array.from(this.bytes);
    }
}
