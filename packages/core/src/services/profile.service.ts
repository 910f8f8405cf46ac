import crypto from 'crypto';
import {
    type AttributeCatalog,
    assertBatchCount,
    contextStorage,
    createRandomSource,
    FingerprintGenerator,
    IdentityGenerator,
    logger,
    type IdentityRequest,
    type LogContext,
    type RandomSource,
    type SelectionConstraints
} from '@persona-forge/shared';
import type { Profile, ProfileWriter } from '../storage/profile-writer.js';

export interface ProfileServiceConfig {
    writer: ProfileWriter;
    seed?: number;
    /** Takes precedence over `seed` */
    random?: RandomSource;
    locale?: string;
    maxBatch?: number;
    catalog?: AttributeCatalog;
    referenceDate?: Date;
}

export interface GenerateProfilesOptions {
    constraints?: SelectionConstraints;
    identity?: IdentityRequest;
    /** Called after each profile is persisted */
    onWritten?: (location: string, index: number) => void;
}

export interface ProfileBatchResult {
    batchId: string;
    profiles: Profile[];
    files: string[];
}

/**
 * Pairs one identity with one fingerprint per profile. Both generators draw
 * from the same random source, so a seeded service replays whole batches.
 */
export class ProfileService {
    readonly random: RandomSource;
    readonly maxBatch: number;
    private readonly fingerprints: FingerprintGenerator;
    private readonly identities: IdentityGenerator;
    private readonly writer: ProfileWriter;

    constructor(config: ProfileServiceConfig) {
        this.random = config.random ?? createRandomSource(config.seed);
        this.maxBatch = config.maxBatch ?? 10000;
        this.writer = config.writer;
        this.fingerprints = new FingerprintGenerator({ random: this.random, catalog: config.catalog });
        this.identities = new IdentityGenerator({
            random: this.random,
            locale: config.locale,
            referenceDate: config.referenceDate
        });
    }

    createProfile(options: GenerateProfilesOptions = {}): Profile {
        const identity = this.identities.generate(options.identity);
        const fingerprint = this.fingerprints.generate(options.constraints);
        return { identity, fingerprint };
    }

    /**
     * Generates the whole batch in memory. Fail-fast: nothing is returned if any profile fails.
     */
    createProfiles(count: number, options: GenerateProfilesOptions = {}): Profile[] {
        assertBatchCount(count, this.maxBatch);

        const store = contextStorage.getStore();
        const profiles: Profile[] = [];
        for (let i = 1; i <= count; i++) {
            store?.set('profileIndex', i);
            profiles.push(this.createProfile(options));
        }
        store?.delete('profileIndex');
        return profiles;
    }

    /**
     * Generate and persist a batch. Nothing is written unless every profile
     * was generated; a write failure stops the batch at that profile.
     */
    async generateProfiles(count: number, options: GenerateProfilesOptions = {}): Promise<ProfileBatchResult> {
        assertBatchCount(count, this.maxBatch);

        const batchId = crypto.randomUUID();
        const store: LogContext = new Map<string, string | number>([['batchId', batchId]]);

        return contextStorage.run(store, async () => {
            const startTime = Date.now();

            // 1. Generate every profile up front
            const profiles = this.createProfiles(count, options);

            // 2. Persist in order
            const files: string[] = [];
            for (const [offset, profile] of profiles.entries()) {
                const index = offset + 1;
                store.set('profileIndex', index);
                const location = await this.writer.write(profile, index);
                files.push(location);
                options.onWritten?.(location, index);
            }
            store.delete('profileIndex');

            logger.info({ count, durationMs: Date.now() - startTime }, 'Profile batch generated');
            return { batchId, profiles, files };
        });
    }
}

export function createProfileService(config: ProfileServiceConfig): ProfileService {
    return new ProfileService(config);
}
