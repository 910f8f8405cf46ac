import crypto from 'crypto';
import { EntropySourceUnavailableError, InternalError, InvalidArgumentError } from '../types/errors.js';

/**
 * Explicitly owned stream of randomness.
 *
 * Every component that draws random values receives one of these instead of
 * touching a process-wide generator, so two callers never share a stream.
 */
export interface RandomSource {
    /** Float in [0, 1) */
    next(): number;

    /** Integer in [min, max], both inclusive */
    nextInt(min: number, max: number): number;

    /** Uniform choice from a non-empty list */
    pick<T>(items: readonly T[]): T;

    /** Independent child stream, for handing one unit of work its own randomness */
    fork(): RandomSource;
}

abstract class BaseRandomSource implements RandomSource {
    abstract next(): number;
    abstract fork(): RandomSource;

    nextInt(min: number, max: number): number {
        if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
            throw new InternalError(`Invalid integer range [${min}, ${max}]`);
        }
        return Math.floor(this.next() * (max - min + 1)) + min;
    }

    pick<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new InternalError('Cannot pick from an empty list');
        }
        return items[this.nextInt(0, items.length - 1)];
    }
}

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 16807;

/**
 * Park-Miller minimal standard generator. Every intermediate product stays
 * below 2^53, so the sequence is exact and identical on every platform.
 */
export class SeededRandom extends BaseRandomSource {
    private state: number;

    constructor(readonly seed: number) {
        super();
        if (!Number.isSafeInteger(seed)) {
            throw new InvalidArgumentError('Seed must be an integer', [
                { field: 'seed', message: `Expected a safe integer, received ${seed}` }
            ]);
        }
        // state lives in [1, MODULUS - 1]; zero would lock the generator at zero
        let state = seed % MODULUS;
        if (state < 0) state += MODULUS;
        this.state = state === 0 ? MODULUS - 1 : state;
    }

    next(): number {
        this.state = (this.state * MULTIPLIER) % MODULUS;
        return (this.state - 1) / (MODULUS - 1);
    }

    fork(): SeededRandom {
        return new SeededRandom(this.nextInt(1, MODULUS - 1));
    }
}

const UNIT_BYTES = 6;
const UNIT_SCALE = 2 ** (UNIT_BYTES * 8);

/**
 * Non-reproducible source backed by the operating system CSPRNG.
 */
export class CryptoRandom extends BaseRandomSource {
    next(): number {
        let bytes: Buffer;
        try {
            bytes = crypto.randomBytes(UNIT_BYTES);
        } catch (error) {
            throw new EntropySourceUnavailableError(error);
        }
        return bytes.readUIntBE(0, UNIT_BYTES) / UNIT_SCALE;
    }

    fork(): CryptoRandom {
        return new CryptoRandom();
    }
}

/**
 * Seeded when a seed is given, system entropy otherwise.
 */
export function createRandomSource(seed?: number): RandomSource {
    return seed === undefined ? new CryptoRandom() : new SeededRandom(seed);
}
