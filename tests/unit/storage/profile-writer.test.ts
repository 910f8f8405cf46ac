import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FingerprintGenerator, IdentityGenerator, PersistenceError } from '@persona-forge/shared';
import { FileProfileWriter, createFileProfileWriter, toProfileDocument, type Profile } from '@persona-forge/core';

function sampleProfile(): Profile {
    return {
        identity: new IdentityGenerator({ seed: 3, referenceDate: new Date('2024-06-15T00:00:00Z') }).generate(),
        fingerprint: new FingerprintGenerator({ seed: 3 }).generate()
    };
}

describe('FileProfileWriter', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'profile-writer-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should name files by prefix and index', () => {
        const writer = new FileProfileWriter({ directory: dir });

        expect(writer.filePathFor(3)).toBe(path.join(dir, 'fake_profile_3.json'));
        expect(createFileProfileWriter({ directory: dir, filePrefix: 'persona_' }).filePathFor(1))
            .toBe(path.join(dir, 'persona_1.json'));
    });

    it('should write the profile as indented snake_case JSON', async () => {
        const profile = sampleProfile();
        const writer = new FileProfileWriter({ directory: dir });

        const filePath = await writer.write(profile, 1);
        const raw = await readFile(filePath, 'utf8');

        expect(filePath).toBe(path.join(dir, 'fake_profile_1.json'));
        expect(raw.startsWith('{\n    "identity": {\n        "full_name": ')).toBe(true);
        expect(JSON.parse(raw)).toEqual(toProfileDocument(profile));
        expect(JSON.parse(raw).fingerprint.fingerprint_hash).toBe(profile.fingerprint.fingerprintHash);
    });

    it('should create missing directories', async () => {
        const nested = path.join(dir, 'nested', 'out');
        const writer = new FileProfileWriter({ directory: nested });

        const filePath = await writer.write(sampleProfile(), 2);

        expect(filePath).toBe(path.join(nested, 'fake_profile_2.json'));
        await expect(readFile(filePath, 'utf8')).resolves.toContain('"fingerprint"');
    });

    it('should wrap I/O failures in PersistenceError', async () => {
        const blocker = path.join(dir, 'blocked');
        await writeFile(blocker, 'not a directory', 'utf8');
        const writer = new FileProfileWriter({ directory: path.join(blocker, 'sub') });

        const failure = writer.write(sampleProfile(), 1);

        await expect(failure).rejects.toBeInstanceOf(PersistenceError);
        await expect(failure).rejects.toMatchObject({
            code: 'PERSISTENCE_ERROR',
            path: path.join(blocker, 'sub', 'fake_profile_1.json')
        });
    });
});
