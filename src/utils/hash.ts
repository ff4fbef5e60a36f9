/**
 * Deterministic, non-cryptographic hashing used to spread liquifunding times.
 *
 * FNV-1a over the UTF-8 bytes of the inputs. Same inputs always give the same
 * output, so a replayed message history produces identical schedules.
 */

const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

export function fnv1a64(parts: Array<string | number>): bigint {
    let hash = FNV_OFFSET;
    const bytes = Buffer.from(parts.map(String).join('\u0000'), 'utf8');
    for (const byte of bytes) {
        hash ^= BigInt(byte);
        hash = (hash * FNV_PRIME) & MASK_64;
    }
    return hash;
}

/**
 * Offset in [0, rangeMs) derived from (time, owner, id)
 */
export function fuzzOffsetMs(time: number, owner: string, id: number, rangeSeconds: number): number {
    if (rangeSeconds <= 0) return 0;
    const seconds = fnv1a64([time, owner, id]) % BigInt(rangeSeconds);
    return Number(seconds) * 1000;
}
