// src/utils/serialization/serializationHelpers.ts

const UINT16_MAX = 0xffff;

/**
 * Big-endian bytes of a 16-bit length field.
 *
 * @throws RangeError unless `value` is an integer in 0..65535.
 */
export function serializeUInt16(value: number): Uint8Array {
    if (!Number.isInteger(value) || value < 0 || value > UINT16_MAX) {
        throw new RangeError(`${value} does not fit an unsigned 16-bit field.`);
    }
    return Uint8Array.of(value >>> 8, value & 0xff);
}

/**
 * Reads a big-endian 16-bit field from `bytes` at `offset`, together with the
 * offset just past it.
 *
 * @throws RangeError if the field runs past the end of `bytes`.
 */
export function deserializeUInt16(bytes: Uint8Array, offset: number): { value: number; newOffset: number } {
    if (offset < 0 || offset + 2 > bytes.length) {
        throw new RangeError(`No 16-bit field at offset ${offset} of a ${bytes.length}-byte buffer.`);
    }
    return { value: (bytes[offset] << 8) | bytes[offset + 1], newOffset: offset + 2 };
}
