// src/utils/checksum/crc8.ts

const CRC8_POLYNOMIAL = 0x07;

const CRC8_TABLE: Uint8Array = (() => {
    const table = new Uint8Array(256);
    for (let n = 0; n < 256; n++) {
        let c = n;
        for (let k = 0; k < 8; k++) {
            c = c & 0x80 ? ((c << 1) ^ CRC8_POLYNOMIAL) & 0xff : (c << 1) & 0xff;
        }
        table[n] = c;
    }
    return table;
})();

/**
 * CRC-8 (polynomial 0x07, initial value 0, no reflection, no final xor).
 */
export function crc8(data: Uint8Array): number {
    let crc = 0;
    for (let i = 0; i < data.length; i++) {
        crc = CRC8_TABLE[crc ^ data[i]];
    }
    return crc;
}
