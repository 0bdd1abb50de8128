// src/utils/bitManipulation/bitUtils.ts

/**
 * Extracts `bitCount` bits from a byte, starting at bit position `startBit` (0 = LSB).
 *
 * @param byte - Source byte.
 * @param startBit - Position of the lowest bit to read.
 * @param bitCount - Number of bits to read, 1 to 8.
 * @return The bits, shifted down to the low end.
 */
export function extractBits(byte: number, startBit: number, bitCount: number): number {
    const mask = (1 << bitCount) - 1;
    return (byte >> startBit) & mask;
}

/**
 * Inserts the low `bitCount` bits of `bits` into a byte at `startBit`, leaving every other bit untouched.
 *
 * @param byte - Byte to modify.
 * @param bits - Value whose low `bitCount` bits are written.
 * @param startBit - Position of the lowest bit to write.
 * @param bitCount - Number of bits to write, 1 to 8.
 * @return The modified byte.
 */
export function insertBits(byte: number, bits: number, startBit: number, bitCount: number): number {
    const mask = ((1 << bitCount) - 1) << startBit;
    return (byte & ~mask) | ((bits << startBit) & mask);
}

/**
 * Number of set bits in a byte.
 */
export function popcount8(byte: number): number {
    let v = byte & 0xff;
    v = v - ((v >> 1) & 0x55);
    v = (v & 0x33) + ((v >> 2) & 0x33);
    return (v + (v >> 4)) & 0x0f;
}

/**
 * Expands bytes into one-bit-per-entry form, most significant bit first.
 */
export function bytesToBits(bytes: Uint8Array): Uint8Array {
    const bits = new Uint8Array(bytes.length * 8);
    for (let i = 0; i < bits.length; i++) {
        bits[i] = extractBits(bytes[i >> 3], 7 - (i & 7), 1);
    }
    return bits;
}

/**
 * Packs `byteCount` bytes from a one-bit-per-entry array, starting at `bitOffset`.
 *
 * @throws RangeError if the requested bytes run past the end of `bits`.
 */
export function bitsToBytes(bits: Uint8Array, bitOffset: number, byteCount: number): Uint8Array {
    if (bitOffset < 0 || bitOffset + byteCount * 8 > bits.length) {
        throw new RangeError(`Cannot read ${byteCount} bytes at bit offset ${bitOffset}.`);
    }
    const bytes = new Uint8Array(byteCount);
    for (let i = 0; i < byteCount * 8; i++) {
        bytes[i >> 3] = insertBits(bytes[i >> 3], bits[bitOffset + i], 7 - (i & 7), 1);
    }
    return bytes;
}
