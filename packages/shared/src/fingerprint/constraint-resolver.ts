import { AttributeCatalog } from '../catalog/attribute-catalog.js';
import type { RandomSource } from '../random/random-source.js';
import { CatalogError, ConstraintConflictError, InvalidArgumentError, type ValidationIssue } from '../types/errors.js';
import {
    DEVICE_CLASSES,
    isDeviceClass,
    type DeviceClass,
    type ResolvedConfiguration,
    type SelectionConstraints
} from '../types/fingerprint.interface.js';

/**
 * Operating systems each device class can run.
 */
export const DEVICE_CLASS_OPERATING_SYSTEMS: Readonly<Record<DeviceClass, readonly string[]>> = {
    Desktop: ['windows', 'macos', 'linux'],
    Laptop: ['windows', 'macos', 'linux'],
    Mobile: ['android', 'ios'],
    Tablet: ['android', 'ios']
};

/**
 * Browsers an OS is restricted to. An OS missing here accepts every catalog browser.
 */
export const OPERATING_SYSTEM_BROWSERS: Readonly<Record<string, readonly string[]>> = {
    ios: ['safari'],
    android: ['chrome', 'firefox']
};

const RULED_OPERATING_SYSTEMS = new Set(Object.values(DEVICE_CLASS_OPERATING_SYSTEMS).flat());

/**
 * Turns optional caller pins into a concrete, mutually compatible
 * device / OS / browser selection.
 */
export class ConstraintResolver {
    constructor(
        private readonly catalog: AttributeCatalog,
        private readonly random: RandomSource
    ) {
        const requiredOs = [...RULED_OPERATING_SYSTEMS, ...Object.keys(OPERATING_SYSTEM_BROWSERS)];
        const requiredBrowsers = Object.values(OPERATING_SYSTEM_BROWSERS).flat();
        const missing = [
            ...requiredOs.filter(key => !catalog.hasOperatingSystem(key)).map(key => `os:${key}`),
            ...requiredBrowsers.filter(key => !catalog.hasBrowser(key)).map(key => `browser:${key}`)
        ];
        if (missing.length > 0) {
            throw new CatalogError(`Catalog lacks keys required by the pairing rules: ${missing.join(', ')}`, { missing });
        }
    }

    resolve(constraints: SelectionConstraints = {}): ResolvedConfiguration {
        this.assertKnownKeys(constraints);
        const { deviceType: pinnedDevice, os: pinnedOs, browser: pinnedBrowser } = constraints;

        if (pinnedOs !== undefined && pinnedBrowser !== undefined && !this.osAdmitsBrowser(pinnedOs, pinnedBrowser)) {
            throw new ConstraintConflictError(
                `Browser '${pinnedBrowser}' cannot run on OS '${pinnedOs}'`,
                constraints
            );
        }
        if (pinnedDevice !== undefined && pinnedOs !== undefined && !this.deviceAdmitsOs(pinnedDevice, pinnedOs)) {
            throw new ConstraintConflictError(
                `OS '${pinnedOs}' is not available on ${pinnedDevice} devices`,
                constraints
            );
        }

        // unlike a free draw over all classes, pins narrow the classes to those that can host them
        const deviceCandidates = pinnedDevice !== undefined
            ? [pinnedDevice]
            : DEVICE_CLASSES.filter(device => this.osCandidates(device, pinnedOs, pinnedBrowser).length > 0);
        if (deviceCandidates.length === 0) {
            throw new ConstraintConflictError('No device class satisfies the pinned OS and browser', constraints);
        }
        const deviceType = this.random.pick(deviceCandidates);

        const osOptions = this.osCandidates(deviceType, pinnedOs, pinnedBrowser);
        if (osOptions.length === 0) {
            throw new ConstraintConflictError(
                `No OS on ${deviceType} devices can run browser '${pinnedBrowser}'`,
                constraints
            );
        }
        const osKey = this.random.pick(osOptions);
        const osEntry = this.catalog.getOperatingSystem(osKey);
        const osVersion = this.random.pick(osEntry.versions);
        const platform = this.random.pick(osEntry.platforms);

        const browserKey = pinnedBrowser ?? this.random.pick(this.browserCandidates(osKey));
        const browserVersion = this.random.pick(this.catalog.getBrowser(browserKey).versions);

        return { deviceType, osKey, osVersion, platform, browserKey, browserVersion };
    }

    /**
     * Browsers the rules allow on an OS.
     */
    browserCandidates(osKey: string): readonly string[] {
        return Object.prototype.hasOwnProperty.call(OPERATING_SYSTEM_BROWSERS, osKey)
            ? OPERATING_SYSTEM_BROWSERS[osKey]
            : this.catalog.browserKeys;
    }

    private osCandidates(device: DeviceClass, pinnedOs?: string, pinnedBrowser?: string): readonly string[] {
        const options = pinnedOs !== undefined
            ? (this.deviceAdmitsOs(device, pinnedOs) ? [pinnedOs] : [])
            : DEVICE_CLASS_OPERATING_SYSTEMS[device];
        return pinnedBrowser === undefined
            ? options
            : options.filter(os => this.osAdmitsBrowser(os, pinnedBrowser));
    }

    private osAdmitsBrowser(osKey: string, browserKey: string): boolean {
        return this.browserCandidates(osKey).includes(browserKey);
    }

    private deviceAdmitsOs(device: DeviceClass, osKey: string): boolean {
        // catalog OSes outside the device-class rules run on any device
        return DEVICE_CLASS_OPERATING_SYSTEMS[device].includes(osKey) || !RULED_OPERATING_SYSTEMS.has(osKey);
    }

    private assertKnownKeys(constraints: SelectionConstraints): void {
        const issues: ValidationIssue[] = [];
        const { deviceType, browser, os } = constraints;

        if (deviceType !== undefined && !isDeviceClass(deviceType)) {
            issues.push({ field: 'deviceType', message: `Unknown device class '${deviceType}', expected one of ${DEVICE_CLASSES.join(', ')}` });
        }
        if (browser !== undefined && !this.catalog.hasBrowser(browser)) {
            issues.push({ field: 'browser', message: `Unknown browser '${browser}', expected one of ${this.catalog.browserKeys.join(', ')}` });
        }
        if (os !== undefined && !this.catalog.hasOperatingSystem(os)) {
            issues.push({ field: 'os', message: `Unknown OS '${os}', expected one of ${this.catalog.osKeys.join(', ')}` });
        }

        if (issues.length > 0) {
            throw new InvalidArgumentError('Unrecognized selection constraints', issues, { constraints });
        }
    }
}
