import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import {
    logger,
    PersistenceError,
    toFingerprintJSON,
    toIdentityJSON,
    type FingerprintJSON,
    type FingerprintRecord,
    type Identity,
    type IdentityJSON
} from '@persona-forge/shared';

export interface Profile {
    identity: Identity;
    fingerprint: FingerprintRecord;
}

export interface ProfileDocument {
    identity: IdentityJSON;
    fingerprint: FingerprintJSON;
}

/**
 * Persists one profile per call; `index` is 1-based within its batch.
 * Resolves to a location the caller can report back.
 */
export interface ProfileWriter {
    write(profile: Profile, index: number): Promise<string>;
}

export interface FileProfileWriterOptions {
    directory: string;
    filePrefix?: string;
}

export function toProfileDocument(profile: Profile): ProfileDocument {
    return {
        identity: toIdentityJSON(profile.identity),
        fingerprint: toFingerprintJSON(profile.fingerprint)
    };
}

/**
 * One pretty-printed JSON file per profile: `<directory>/<prefix><index>.json`.
 * Existing files with the same name are overwritten.
 */
export class FileProfileWriter implements ProfileWriter {
    readonly directory: string;
    readonly filePrefix: string;

    constructor(options: FileProfileWriterOptions) {
        this.directory = options.directory;
        this.filePrefix = options.filePrefix ?? 'fake_profile_';
    }

    filePathFor(index: number): string {
        return path.join(this.directory, `${this.filePrefix}${index}.json`);
    }

    async write(profile: Profile, index: number): Promise<string> {
        const filePath = this.filePathFor(index);

        try {
            await mkdir(this.directory, { recursive: true });
            await writeFile(filePath, JSON.stringify(toProfileDocument(profile), null, 4), 'utf8');
        } catch (error) {
            throw new PersistenceError(`Failed to write profile to ${filePath}`, filePath, error);
        }

        logger.debug({ filePath }, 'Profile written');
        return filePath;
    }
}

export function createFileProfileWriter(options: FileProfileWriterOptions): FileProfileWriter {
    return new FileProfileWriter(options);
}
