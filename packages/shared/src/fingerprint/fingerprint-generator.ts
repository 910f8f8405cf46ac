import { AttributeCatalog, getDefaultCatalog } from '../catalog/attribute-catalog.js';
import { createRandomSource, type RandomSource } from '../random/random-source.js';
import type { FingerprintRecord, SelectionConstraints } from '../types/fingerprint.interface.js';
import logger from '../utils/logger.js';
import { assertBatchCount } from '../utils/validation.js';
import { ConstraintResolver } from './constraint-resolver.js';
import { FieldSynthesizer } from './field-synthesizer.js';
import { HashDeriver } from './hash-deriver.js';

export interface FingerprintGeneratorOptions {
    /** Reproducible output: same seed and same call sequence give the same records */
    seed?: number;
    /** Takes precedence over `seed` */
    random?: RandomSource;
    catalog?: AttributeCatalog;
}

/**
 * Builds self-consistent browser/device fingerprints.
 *
 * One instance owns one random stream. Give every concurrent caller its own
 * generator (or a `fork()` of a shared source) rather than sharing an instance.
 */
export class FingerprintGenerator {
    readonly random: RandomSource;
    private readonly catalog: AttributeCatalog;
    private readonly resolver: ConstraintResolver;
    private readonly synthesizer: FieldSynthesizer;
    private readonly hashes: HashDeriver;

    constructor(options: FingerprintGeneratorOptions = {}) {
        this.catalog = options.catalog ?? getDefaultCatalog();
        this.random = options.random ?? createRandomSource(options.seed);
        this.resolver = new ConstraintResolver(this.catalog, this.random);
        this.synthesizer = new FieldSynthesizer(this.catalog, this.random);
        this.hashes = new HashDeriver(this.random);
    }

    generate(constraints: SelectionConstraints = {}): FingerprintRecord {
        const config = this.resolver.resolve(constraints);
        logger.debug({ config }, 'Fingerprint configuration resolved');

        const fields = this.synthesizer.synthesize(config);
        const browser = this.catalog.getBrowser(config.browserKey);
        const os = this.catalog.getOperatingSystem(config.osKey);
        const canvasHash = this.hashes.opaqueHash('canvas');
        const audioHash = this.hashes.opaqueHash('audio');

        const fingerprintHash = this.hashes.fingerprintHash({
            userAgent: fields.userAgent,
            screenResolution: fields.screen.resolution,
            timezone: fields.timezone.name,
            language: fields.locale.language,
            webglRenderer: fields.gpu.renderer
        });

        return Object.freeze({
            userAgent: fields.userAgent,
            browserName: browser.name,
            browserVersion: config.browserVersion,
            browserEngine: browser.engine,

            platform: config.platform,
            osName: os.name,
            osVersion: config.osVersion,
            deviceType: config.deviceType,

            screenWidth: fields.screen.width,
            screenHeight: fields.screen.height,
            screenResolution: fields.screen.resolution,
            colorDepth: fields.screen.colorDepth,
            pixelRatio: fields.screen.pixelRatio,

            language: fields.locale.language,
            languages: Object.freeze([...fields.locale.languages]),
            timezone: fields.timezone.name,
            timezoneOffset: fields.timezone.offsetMinutes,

            ipAddress: fields.network.ipAddress,
            connectionType: fields.network.connectionType,

            cpuCores: fields.hardware.cpuCores,
            deviceMemory: fields.hardware.deviceMemory,
            maxTouchPoints: fields.hardware.maxTouchPoints,

            webglVendor: fields.gpu.vendor,
            webglRenderer: fields.gpu.renderer,

            canvasHash,
            audioHash,

            ...fields.features,

            macAddress: fields.macAddress,
            fingerprintHash
        });
    }

    /**
     * Fail-fast: the first error aborts the whole batch.
     */
    generateBatch(count: number, constraints: SelectionConstraints = {}): FingerprintRecord[] {
        assertBatchCount(count);
        const records: FingerprintRecord[] = [];
        for (let i = 0; i < count; i++) {
            records.push(this.generate(constraints));
        }
        logger.debug({ count }, 'Fingerprint batch generated');
        return records;
    }
}

export function createFingerprintGenerator(options: FingerprintGeneratorOptions = {}): FingerprintGenerator {
    return new FingerprintGenerator(options);
}

/**
 * One-off fingerprint from a fresh, unseeded generator.
 */
export function generateFingerprint(constraints: SelectionConstraints = {}): FingerprintRecord {
    return new FingerprintGenerator().generate(constraints);
}
