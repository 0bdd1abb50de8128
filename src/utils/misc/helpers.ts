// src/utils/misc/helpers.ts

/**
 * Concatenates several byte arrays into a new one.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((acc, curr) => acc + curr.length, 0);
    const result = new Uint8Array(totalLength);

    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }

    return result;
}

/**
 * Rounds to two decimals.
 */
export function round2(value: number): number {
    return Math.round(value * 100) / 100;
}
