import crypto from 'crypto';
import type { RandomSource } from '../random/random-source.js';

export const OPAQUE_HASH_LENGTH = 32;
export const FINGERPRINT_HASH_SEPARATOR = '|';

export type OpaqueHashLabel = 'canvas' | 'audio';

/**
 * The five fields that define a fingerprint family.
 */
export interface FingerprintHashInput {
    userAgent: string;
    screenResolution: string;
    timezone: string;
    language: string;
    webglRenderer: string;
}

function sha256Hex(data: string): string {
    return crypto.createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Deterministic SHA-256 over the family fields, full 64-character hex.
 */
export function computeFingerprintHash(input: FingerprintHashInput): string {
    return sha256Hex([
        input.userAgent,
        input.screenResolution,
        input.timezone,
        input.language,
        input.webglRenderer
    ].join(FINGERPRINT_HASH_SEPARATOR));
}

export class HashDeriver {
    constructor(private readonly random: RandomSource) { }

    /**
     * Stand-in for a rendering-based fingerprint (canvas, audio). Fresh on every
     * call and unrelated to the rest of the record.
     */
    opaqueHash(label: OpaqueHashLabel): string {
        const data = `${label}_${this.random.next()}_${this.random.nextInt(0, 1_000_000)}`;
        return sha256Hex(data).slice(0, OPAQUE_HASH_LENGTH);
    }

    fingerprintHash(input: FingerprintHashInput): string {
        return computeFingerprintHash(input);
    }
}
