/**
 * GRIB Run Fetcher — File Digests
 *
 * Every downloaded file is recorded in the run metadata by its BLAKE3 digest,
 * lowercase hex.
 */

import { blake3 } from '@noble/hashes/blake3.js';

export function hashHex(data: Uint8Array): string {
    let hex = '';
    for (const byte of blake3(data)) {
        hex += byte.toString(16).padStart(2, '0');
    }
    return hex;
}

/** True when `data` digests to `expectedHex` (either case). */
export function verifyHash(data: Uint8Array, expectedHex: string): boolean {
    return hashHex(data) === expectedHex.toLowerCase();
}
