// src/core/watermark/extract.ts

import type {
    IBitPlan,
    IExtractResult,
    ImageInput,
    IWatermarkOptions,
    IWatermarkScan,
    WatermarkStrength,
} from '../../@types/index.js';
import { config, WATERMARK_MAGIC } from '../../config/index.js';
import { bitsToBytes, popcount8 } from '../../utils/bitManipulation/bitUtils.js';
import { getLogger } from '../../utils/logging/logUtils.js';
import { deserializeUInt16 } from '../../utils/serialization/serializationHelpers.js';
import { PixelBuffer } from '../pixelBuffer/PixelBuffer.js';
import { distinctPlansFor } from './bitPlans.js';
import { readBitStream } from './bitStream.js';
import { WatermarkPayload } from './payload.js';

const MAGIC_WORD = new DataView(WATERMARK_MAGIC.buffer).getUint32(0, false);
const HEADER_BITS = (WATERMARK_MAGIC.length + 2) * 8;

interface ICopyLayout {
    copyBits: number;
    phase: number;
}

interface IPlanScan {
    strength: WatermarkStrength;
    layout: ICopyLayout;
    copies: Uint8Array[];
    validCopies: WatermarkPayload[];
    consensus: Uint8Array;
    consensusPayload: WatermarkPayload | null;
}

/**
 * Bit offsets at which the 32-bit magic word starts.
 */
function findMagicOffsets(bits: Uint8Array): number[] {
    const offsets: number[] = [];
    let window = 0;
    for (let i = 0; i < bits.length; i++) {
        window = ((window << 1) | bits[i]) >>> 0;
        if (i >= 31 && window === MAGIC_WORD) {
            offsets.push(i - 31);
        }
    }
    return offsets;
}

/**
 * Most frequent key; ties go to the key seen first.
 */
function mostFrequent(keys: number[]): number | null {
    const counts = new Map<number, number>();
    let best: number | null = null;
    let bestCount = 0;
    for (const key of keys) {
        const count = (counts.get(key) ?? 0) + 1;
        counts.set(key, count);
        if (count > bestCount) {
            best = key;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Derives copy length and alignment from the marker candidates. Copies are
 * laid back to back, so every intact marker agrees on both.
 */
function resolveCopyLayout(bits: Uint8Array, offsets: number[]): ICopyLayout | null {
    const lengths: number[] = [];
    const usable: number[] = [];
    for (const offset of offsets) {
        if (offset + HEADER_BITS > bits.length) continue;
        const header = bitsToBytes(bits, offset, WATERMARK_MAGIC.length + 2);
        const { value: ownerLength } = deserializeUInt16(header, WATERMARK_MAGIC.length);
        if (ownerLength === 0 || ownerLength > config.watermark.maxOwnerIdBytes) continue;
        lengths.push(ownerLength);
        usable.push(offset);
    }

    const ownerLength = mostFrequent(lengths);
    if (ownerLength === null) return null;

    const copyBits = WatermarkPayload.serializedLength(ownerLength) * 8;
    const phases = usable.filter((_, i) => lengths[i] === ownerLength).map((offset) => offset % copyBits);
    const phase = mostFrequent(phases);
    return phase === null ? null : { copyBits, phase };
}

/**
 * Per-byte majority vote across copies; ties keep the value met first.
 */
export function majorityVote(copies: Uint8Array[]): Uint8Array {
    const length = copies[0]?.length ?? 0;
    const consensus = new Uint8Array(length);
    const counts = new Uint16Array(256);
    for (let j = 0; j < length; j++) {
        counts.fill(0);
        let best = copies[0][j];
        let bestCount = 0;
        for (const copy of copies) {
            const value = copy[j];
            counts[value]++;
            if (counts[value] > bestCount) {
                best = value;
                bestCount = counts[value];
            }
        }
        consensus[j] = best;
    }
    return consensus;
}

/**
 * Fraction of copy bits that differ from the consensus.
 */
function bitDisagreement(copies: Uint8Array[], consensus: Uint8Array): number {
    if (copies.length === 0 || consensus.length === 0) return 0;
    let differing = 0;
    for (const copy of copies) {
        for (let j = 0; j < consensus.length; j++) {
            differing += popcount8(copy[j] ^ consensus[j]);
        }
    }
    return differing / (copies.length * consensus.length * 8);
}

function scanPlan(buffer: PixelBuffer, bitPlan: IBitPlan): IPlanScan | null {
    const bits = readBitStream(buffer.toUint8Array(), buffer.info, bitPlan);
    const offsets = findMagicOffsets(bits);
    if (offsets.length === 0) return null;

    const layout = resolveCopyLayout(bits, offsets);
    if (!layout) return null;

    const copies: Uint8Array[] = [];
    for (let offset = layout.phase; offset + layout.copyBits <= bits.length; offset += layout.copyBits) {
        copies.push(bitsToBytes(bits, offset, layout.copyBits / 8));
    }
    if (copies.length === 0) return null;

    const validCopies = copies
        .map((copy) => WatermarkPayload.decode(copy))
        .filter((payload): payload is WatermarkPayload => payload !== null);
    const consensus = majorityVote(copies);

    return {
        strength: bitPlan.strength,
        layout,
        copies,
        validCopies,
        consensus,
        consensusPayload: WatermarkPayload.decode(consensus),
    };
}

function toScanResult(scan: IPlanScan): IWatermarkScan {
    const payload = scan.consensusPayload ?? scan.validCopies[0] ?? null;
    const copiesFound = scan.copies.length;
    const validCopies = scan.validCopies.length;
    return {
        payload,
        validity: payload ? 'valid' : 'corrupted',
        strength: scan.strength,
        copiesFound,
        validCopies,
        partialRecovery: payload !== null && validCopies < copiesFound,
        confidence: copiesFound === 0 ? 0 : validCopies / copiesFound,
        copyBits: scan.layout.copyBits,
        bitDisagreement: bitDisagreement(scan.copies, scan.consensus),
    };
}

const NOT_FOUND: IWatermarkScan = {
    payload: null,
    validity: 'not_found',
    strength: null,
    copiesFound: 0,
    validCopies: 0,
    partialRecovery: false,
    confidence: 0,
    copyBits: 0,
    bitDisagreement: 0,
};

/**
 * Scans every supported strength, lowest first, and reports the first one
 * that yields a valid payload together with copy-level statistics. When
 * markers turn up but nothing validates, the first such strength is
 * reported as corrupted.
 *
 * @param image - Image that may carry a watermark.
 * @param options - Optional logger; per-strength findings go to debug.
 * @return The extraction result plus copy length and the bit disagreement
 * between copies and their consensus (0 when nothing was found).
 *
 * @throws InvalidImageError if `image` is malformed.
 */
export function scanWatermark(image: ImageInput, options: IWatermarkOptions = {}): IWatermarkScan {
    const logger = options.logger ?? getLogger('watermark');
    const buffer = PixelBuffer.from(image);
    let corrupted: IWatermarkScan | null = null;

    for (const bitPlan of distinctPlansFor(buffer.channels)) {
        const scan = scanPlan(buffer, bitPlan);
        if (!scan) continue;

        const result = toScanResult(scan);
        logger.debug(
            `Strength ${bitPlan.strength}: ${result.copiesFound} copies, ${result.validCopies} valid, consensus ${
                scan.consensusPayload ? 'valid' : 'invalid'
            }.`,
        );
        if (result.validity === 'valid') return result;
        corrupted ??= result;
    }

    return corrupted ?? { ...NOT_FOUND };
}

/**
 * Recovers the owner id embedded by `embed`, without being told the strength.
 * Missing and corrupted watermarks are reported through `validity`.
 */
export function extract(image: ImageInput, options: IWatermarkOptions = {}): IExtractResult {
    const { payload, validity, strength, copiesFound, validCopies, partialRecovery, confidence } = scanWatermark(
        image,
        options,
    );
    return { payload, validity, strength, copiesFound, validCopies, partialRecovery, confidence };
}
