import type { AttributeCatalog, GpuEntry, ScreenEntry } from '../catalog/attribute-catalog.js';
import type { RandomSource } from '../random/random-source.js';
import type {
    ConnectionType,
    DeviceClass,
    DoNotTrack,
    ResolvedConfiguration
} from '../types/fingerprint.interface.js';
import { buildUserAgent } from './user-agent.js';

export interface ScreenProfile {
    width: number;
    height: number;
    resolution: string;
    colorDepth: number;
    pixelRatio: number;
}

export interface LocaleProfile {
    language: string;
    languages: string[];
}

export interface TimezoneProfile {
    name: string;
    offsetMinutes: number;
}

export interface HardwareProfile {
    cpuCores: number;
    deviceMemory: number;
    maxTouchPoints: number;
}

export interface NetworkProfile {
    ipAddress: string;
    /** CIDR block the address was drawn from */
    range: string;
    connectionType: ConnectionType;
}

export interface BrowserFeatures {
    doNotTrack: DoNotTrack;
    cookiesEnabled: boolean;
    localStorage: boolean;
    sessionStorage: boolean;
    indexedDb: boolean;
}

export interface SynthesizedFields {
    userAgent: string;
    screen: ScreenProfile;
    locale: LocaleProfile;
    timezone: TimezoneProfile;
    hardware: HardwareProfile;
    gpu: GpuEntry;
    network: NetworkProfile;
    macAddress: string;
    features: BrowserFeatures;
}

interface PrivateRange {
    cidr: string;
    /** Inclusive [min, max] per octet */
    octets: readonly [readonly [number, number], readonly [number, number], readonly [number, number], readonly [number, number]];
}

export const PRIVATE_RANGES: readonly PrivateRange[] = [
    { cidr: '10.0.0.0/8', octets: [[10, 10], [0, 255], [0, 255], [0, 255]] },
    { cidr: '172.16.0.0/12', octets: [[172, 172], [16, 31], [0, 255], [0, 255]] },
    { cidr: '192.168.0.0/16', octets: [[192, 192], [168, 168], [0, 255], [0, 255]] }
];

interface HardwareTable {
    cores: readonly number[];
    memory: readonly number[];
    touchPoints: readonly number[];
}

const DESKTOP_HARDWARE: HardwareTable = { cores: [4, 6, 8, 12, 16], memory: [8, 16, 32, 64], touchPoints: [0] };
const MOBILE_HARDWARE: HardwareTable = { cores: [4, 6, 8], memory: [4, 6, 8, 12], touchPoints: [5, 10] };

const COLOR_DEPTHS: readonly number[] = [24, 32];
const PIXEL_RATIOS: readonly number[] = [1, 1.25, 1.5, 2, 3];
const CONNECTION_TYPES: readonly ConnectionType[] = ['wifi', 'ethernet', '4g', '5g'];
const DO_NOT_TRACK_VALUES: readonly DoNotTrack[] = [null, '1', '0'];

function isTouchDevice(deviceType: DeviceClass): boolean {
    return deviceType === 'Mobile' || deviceType === 'Tablet';
}

/**
 * Derives every fingerprint field that depends on the resolved configuration
 * or on an independent draw from the random source.
 */
export class FieldSynthesizer {
    constructor(
        private readonly catalog: AttributeCatalog,
        private readonly random: RandomSource
    ) { }

    synthesize(config: ResolvedConfiguration): SynthesizedFields {
        return {
            userAgent: this.userAgent(config),
            screen: this.screen(config.deviceType),
            locale: this.locale(),
            timezone: this.timezone(),
            hardware: this.hardware(config.deviceType),
            gpu: this.gpu(),
            network: this.network(),
            macAddress: this.macAddress(),
            features: this.features()
        };
    }

    userAgent(config: ResolvedConfiguration): string {
        return buildUserAgent(config, this.catalog.getOperatingSystem(config.osKey));
    }

    screen(deviceType: DeviceClass): ScreenProfile {
        const entry = this.random.pick(this.eligibleScreens(deviceType));
        return {
            width: entry.width,
            height: entry.height,
            resolution: `${entry.width}x${entry.height}`,
            colorDepth: this.random.pick(COLOR_DEPTHS),
            pixelRatio: this.random.pick(PIXEL_RATIOS)
        };
    }

    /**
     * Screens tagged with the device class; laptops may also drive desktop panels.
     * Falls back to the whole table when nothing matches.
     */
    eligibleScreens(deviceType: DeviceClass): readonly ScreenEntry[] {
        const matching = this.catalog.screens.filter(screen =>
            screen.deviceClass === deviceType || (deviceType === 'Laptop' && screen.deviceClass === 'Desktop')
        );
        return matching.length > 0 ? matching : this.catalog.screens;
    }

    locale(): LocaleProfile {
        const language = this.random.pick(this.catalog.locales);
        const separator = language.indexOf('-');
        return {
            language,
            languages: separator > 0 ? [language, language.slice(0, separator)] : [language]
        };
    }

    timezone(): TimezoneProfile {
        const entry = this.random.pick(this.catalog.timezones);
        return { name: entry.name, offsetMinutes: entry.offsetHours * 60 };
    }

    hardware(deviceType: DeviceClass): HardwareProfile {
        const table = isTouchDevice(deviceType) ? MOBILE_HARDWARE : DESKTOP_HARDWARE;
        return {
            cpuCores: this.random.pick(table.cores),
            deviceMemory: this.random.pick(table.memory),
            maxTouchPoints: this.random.pick(table.touchPoints)
        };
    }

    // independent of OS and device class
    gpu(): GpuEntry {
        return this.random.pick(this.catalog.gpus);
    }

    network(): NetworkProfile {
        const range = this.random.pick(PRIVATE_RANGES);
        const ipAddress = range.octets.map(([min, max]) => this.random.nextInt(min, max)).join('.');
        return {
            ipAddress,
            range: range.cidr,
            connectionType: this.random.pick(CONNECTION_TYPES)
        };
    }

    macAddress(): string {
        return Array.from({ length: 6 }, () => this.random.nextInt(0, 255).toString(16).padStart(2, '0')).join(':');
    }

    features(): BrowserFeatures {
        return {
            doNotTrack: this.random.pick(DO_NOT_TRACK_VALUES),
            cookiesEnabled: true,
            localStorage: true,
            sessionStorage: true,
            indexedDb: true
        };
    }
}
