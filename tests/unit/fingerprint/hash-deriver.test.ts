import { describe, expect, it } from 'vitest';
import {
    HashDeriver,
    OPAQUE_HASH_LENGTH,
    SeededRandom,
    computeFingerprintHash
} from '@persona-forge/shared';
import { FixedRandom } from '../../utils/test-helpers.js';

describe('computeFingerprintHash', () => {
    it('should hash the pipe-joined family fields with SHA-256', () => {
        const hash = computeFingerprintHash({
            userAgent: 'a',
            screenResolution: 'b',
            timezone: 'c',
            language: 'd',
            webglRenderer: 'e'
        });

        expect(hash).toBe('2d4b7507de8bf3f1c304248f357c3de417fa87257fb68e22f1afe1da51c504a2');
    });

    it('should change when any family field changes', () => {
        const input = { userAgent: 'a', screenResolution: 'b', timezone: 'c', language: 'd', webglRenderer: 'e' };

        expect(computeFingerprintHash({ ...input, timezone: 'UTC' })).not.toBe(computeFingerprintHash(input));
    });
});

describe('HashDeriver', () => {
    it('should derive the canvas and audio hashes from the random source', () => {
        const hashes = new HashDeriver(new FixedRandom(0));

        expect(hashes.opaqueHash('canvas')).toBe('7a5672f26761330cc6289b093bdbf03d');
        expect(hashes.opaqueHash('audio')).toBe('415885faca4df937dfe2248b074e5b6b');
    });

    it('should produce fresh lowercase hex on every call', () => {
        const hashes = new HashDeriver(new SeededRandom(17));
        const first = hashes.opaqueHash('canvas');
        const second = hashes.opaqueHash('canvas');

        expect(first).toMatch(new RegExp(`^[0-9a-f]{${OPAQUE_HASH_LENGTH}}$`));
        expect(second).not.toBe(first);
    });
});
