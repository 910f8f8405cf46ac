import { describe, expect, it } from 'vitest';
import {
    AttributeCatalog,
    CatalogError,
    ConstraintConflictError,
    ConstraintResolver,
    DEVICE_CLASS_OPERATING_SYSTEMS,
    InvalidArgumentError,
    SeededRandom,
    getDefaultCatalog,
    type CatalogData,
    type DeviceClass
} from '@persona-forge/shared';
import { FixedRandom } from '../../utils/test-helpers.js';

function resolver(seed = 1): ConstraintResolver {
    return new ConstraintResolver(getDefaultCatalog(), new SeededRandom(seed));
}

describe('ConstraintResolver', () => {
    it('should take the first candidate at every step when the source sits at zero', () => {
        const result = new ConstraintResolver(getDefaultCatalog(), new FixedRandom(0)).resolve();

        expect(result).toEqual({
            deviceType: 'Desktop',
            osKey: 'windows',
            osVersion: '10',
            platform: 'Win32',
            browserKey: 'chrome',
            browserVersion: '120.0.0.0'
        });
    });

    it('should always pair ios with safari', () => {
        const subject = resolver(11);

        for (let i = 0; i < 100; i++) {
            const result = subject.resolve({ os: 'ios' });
            expect(result.browserKey).toBe('safari');
            expect(['Mobile', 'Tablet']).toContain(result.deviceType);
        }
    });

    it('should pair android with chrome or firefox only', () => {
        const subject = resolver(12);

        for (let i = 0; i < 100; i++) {
            expect(['chrome', 'firefox']).toContain(subject.resolve({ os: 'android' }).browserKey);
        }
    });

    it('should keep unpinned selections mutually compatible', () => {
        const subject = resolver(13);

        for (let i = 0; i < 300; i++) {
            const result = subject.resolve();
            expect(DEVICE_CLASS_OPERATING_SYSTEMS[result.deviceType]).toContain(result.osKey);
            expect(subject.browserCandidates(result.osKey)).toContain(result.browserKey);
            expect(getDefaultCatalog().getOperatingSystem(result.osKey).versions).toContain(result.osVersion);
            expect(getDefaultCatalog().getBrowser(result.browserKey).versions).toContain(result.browserVersion);
        }
    });

    it('should honour every pinned value', () => {
        const result = resolver().resolve({ deviceType: 'Laptop', os: 'linux', browser: 'firefox' });

        expect(result.deviceType).toBe('Laptop');
        expect(result.osKey).toBe('linux');
        expect(result.browserKey).toBe('firefox');
    });

    it('should accept safari on a windows desktop', () => {
        const result = resolver().resolve({ deviceType: 'Desktop', browser: 'safari', os: 'windows' });

        expect(result.browserKey).toBe('safari');
        expect(result.osKey).toBe('windows');
    });

    it('should choose a mobile device for a pinned ios', () => {
        const subject = resolver(21);
        const devices = new Set<DeviceClass>();

        for (let i = 0; i < 50; i++) {
            devices.add(subject.resolve({ os: 'ios' }).deviceType);
        }

        expect([...devices].sort()).toEqual(['Mobile', 'Tablet']);
    });

    describe('conflicts', () => {
        it('should reject firefox on ios', () => {
            expect(() => resolver().resolve({ os: 'ios', browser: 'firefox' }))
                .toThrow(new ConstraintConflictError("Browser 'firefox' cannot run on OS 'ios'", {}));
        });

        it('should reject a desktop OS on a mobile device', () => {
            expect(() => resolver().resolve({ deviceType: 'Mobile', os: 'windows' }))
                .toThrow("OS 'windows' is not available on Mobile devices");
        });

        it('should reject a browser no OS of the pinned device class can run', () => {
            expect(() => resolver().resolve({ deviceType: 'Mobile', browser: 'edge' }))
                .toThrow("No OS on Mobile devices can run browser 'edge'");
        });

        it('should carry the pinned constraints on the error', () => {
            try {
                resolver().resolve({ os: 'ios', browser: 'chrome' });
                expect.unreachable('resolve should throw');
            } catch (error) {
                expect(error).toBeInstanceOf(ConstraintConflictError);
                if (error instanceof ConstraintConflictError) {
                    expect(error.constraints).toEqual({ os: 'ios', browser: 'chrome' });
                    expect(error.getGroupingKey()).toBe('CONSTRAINT_CONFLICT:constraint_resolution');
                }
            }
        });
    });

    describe('unknown keys', () => {
        it('should reject browsers missing from the catalog', () => {
            expect(() => resolver().resolve({ browser: 'opera' })).toThrow(InvalidArgumentError);
        });

        it('should list every unknown key', () => {
            try {
                resolver().resolve({ browser: 'opera', os: 'beos' });
                expect.unreachable('resolve should throw');
            } catch (error) {
                expect(error).toBeInstanceOf(InvalidArgumentError);
                if (error instanceof InvalidArgumentError) {
                    expect(error.message).toBe('Unrecognized selection constraints');
                    expect(error.issues.map(issue => issue.field)).toEqual(['browser', 'os']);
                }
            }
        });
    });

    describe('catalog requirements', () => {
        it('should refuse a catalog that lacks operating systems the rules name', () => {
            const data: CatalogData = {
                browsers: { chrome: { name: 'Chrome', engine: 'Blink', versions: ['120.0.0.0'] } },
                operatingSystems: {
                    windows: { name: 'Windows', versions: ['11'], platforms: ['Win64'], userAgentTemplate: 'Windows NT {version}' }
                },
                screens: [{ width: 1920, height: 1080, deviceClass: 'Desktop' }],
                locales: ['en-US'],
                timezones: [{ name: 'UTC', offsetHours: 0 }],
                gpus: [{ vendor: 'Test Vendor', renderer: 'Test Renderer' }]
            };

            expect(() => new ConstraintResolver(AttributeCatalog.fromData(data), new FixedRandom()))
                .toThrow(CatalogError);
        });
    });
});
