import crypto from 'crypto';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
    CryptoRandom,
    EntropySourceUnavailableError,
    InternalError,
    InvalidArgumentError,
    SeededRandom,
    createRandomSource
} from '@persona-forge/shared';

const MODULUS = 2147483647;

function draw(source: { next(): number }, count: number): number[] {
    return Array.from({ length: count }, () => source.next());
}

describe('SeededRandom', () => {
    it('should follow the minimal standard sequence', () => {
        const random = new SeededRandom(1);

        expect(random.next()).toBe(16806 / (MODULUS - 1));
        expect(random.next()).toBe((282475249 - 1) / (MODULUS - 1));
    });

    it('should replay the same stream for the same seed', () => {
        expect(draw(new SeededRandom(42), 20)).toEqual(draw(new SeededRandom(42), 20));
    });

    it('should produce different streams for different seeds', () => {
        expect(draw(new SeededRandom(42), 5)).not.toEqual(draw(new SeededRandom(43), 5));
    });

    it('should map zero, negative and modulus-sized seeds into the valid state range', () => {
        const expected = draw(new SeededRandom(MODULUS - 1), 3);

        expect(draw(new SeededRandom(0), 3)).toEqual(expected);
        expect(draw(new SeededRandom(-1), 3)).toEqual(expected);
        expect(draw(new SeededRandom(MODULUS), 3)).toEqual(expected);
    });

    it('should reject non-integer seeds', () => {
        expect(() => new SeededRandom(1.5)).toThrow(InvalidArgumentError);
        expect(() => new SeededRandom(Number.NaN)).toThrow('Seed must be an integer');
    });

    it('should keep nextInt within inclusive bounds', () => {
        const random = new SeededRandom(7);
        const seen = new Set<number>();

        for (let i = 0; i < 500; i++) {
            const value = random.nextInt(3, 6);
            expect(value).toBeGreaterThanOrEqual(3);
            expect(value).toBeLessThanOrEqual(6);
            seen.add(value);
        }

        expect([...seen].sort()).toEqual([3, 4, 5, 6]);
    });

    it('should reject inverted or fractional ranges', () => {
        const random = new SeededRandom(7);

        expect(() => random.nextInt(5, 4)).toThrow(InternalError);
        expect(() => random.nextInt(0.5, 4)).toThrow('Invalid integer range [0.5, 4]');
    });

    it('should refuse to pick from an empty list', () => {
        expect(() => new SeededRandom(7).pick([])).toThrow('Cannot pick from an empty list');
    });

    it('should fork a reproducible child that does not mirror its parent', () => {
        const parent = new SeededRandom(99);
        const child = parent.fork();
        const twin = new SeededRandom(99).fork();

        expect(draw(child, 5)).toEqual(draw(twin, 5));
        expect(draw(child, 5)).not.toEqual(draw(parent, 5));
    });
});

describe('CryptoRandom', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should produce values in [0, 1)', () => {
        const random = new CryptoRandom();

        for (const value of draw(random, 100)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    it('should raise EntropySourceUnavailableError when the system source fails', () => {
        vi.spyOn(crypto, 'randomBytes').mockImplementation(() => {
            throw new Error('no entropy');
        });

        const random = new CryptoRandom();

        expect(() => random.next()).toThrow(EntropySourceUnavailableError);
        try {
            random.next();
        } catch (error) {
            expect(error).toBeInstanceOf(EntropySourceUnavailableError);
            if (error instanceof EntropySourceUnavailableError) {
                expect(error.fatal).toBe(true);
                expect(error.code).toBe('ENTROPY_UNAVAILABLE');
            }
        }
    });
});

describe('createRandomSource', () => {
    it('should build a seeded source when given a seed', () => {
        const random = createRandomSource(5);

        expect(random).toBeInstanceOf(SeededRandom);
        expect(draw(random, 3)).toEqual(draw(new SeededRandom(5), 3));
    });

    it('should fall back to system entropy without a seed', () => {
        expect(createRandomSource()).toBeInstanceOf(CryptoRandom);
    });
});
