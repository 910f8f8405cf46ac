export const DEVICE_CLASSES = ['Desktop', 'Laptop', 'Mobile', 'Tablet'] as const;

export type DeviceClass = typeof DEVICE_CLASSES[number];

export function isDeviceClass(value: string): value is DeviceClass {
    return (DEVICE_CLASSES as readonly string[]).includes(value);
}

/**
 * Optional pins supplied by the caller. Anything left unset is drawn at random.
 */
export interface SelectionConstraints {
    deviceType?: DeviceClass;
    browser?: string;
    os?: string;
}

export interface ResolvedConfiguration {
    deviceType: DeviceClass;
    osKey: string;
    osVersion: string;
    platform: string;
    browserKey: string;
    browserVersion: string;
}

export type ConnectionType = 'wifi' | 'ethernet' | '4g' | '5g';

/** `null` means the browser does not send the header at all */
export type DoNotTrack = '1' | '0' | null;

export interface FingerprintRecord {
    readonly userAgent: string;
    readonly browserName: string;
    readonly browserVersion: string;
    readonly browserEngine: string;

    readonly platform: string;
    readonly osName: string;
    readonly osVersion: string;
    readonly deviceType: DeviceClass;

    readonly screenWidth: number;
    readonly screenHeight: number;
    readonly screenResolution: string;
    readonly colorDepth: number;
    readonly pixelRatio: number;

    readonly language: string;
    readonly languages: readonly string[];
    readonly timezone: string;
    readonly timezoneOffset: number;

    readonly ipAddress: string;
    readonly connectionType: ConnectionType;

    readonly cpuCores: number;
    readonly deviceMemory: number;
    readonly maxTouchPoints: number;

    readonly webglVendor: string;
    readonly webglRenderer: string;

    readonly canvasHash: string;
    readonly audioHash: string;

    readonly doNotTrack: DoNotTrack;
    readonly cookiesEnabled: boolean;
    readonly localStorage: boolean;
    readonly sessionStorage: boolean;
    readonly indexedDb: boolean;

    readonly macAddress: string;

    /** Stable across calls for the same user agent, screen, timezone, language and renderer */
    readonly fingerprintHash: string;
}

/**
 * On-disk shape of a fingerprint, as consumed by downstream fixtures.
 */
export interface FingerprintJSON {
    user_agent: string;
    browser_name: string;
    browser_version: string;
    browser_engine: string;
    platform: string;
    os_name: string;
    os_version: string;
    device_type: DeviceClass;
    screen_width: number;
    screen_height: number;
    screen_resolution: string;
    color_depth: number;
    pixel_ratio: number;
    language: string;
    languages: string[];
    timezone: string;
    timezone_offset: number;
    ip_address: string;
    connection_type: ConnectionType;
    cpu_cores: number;
    device_memory: number;
    max_touch_points: number;
    webgl_vendor: string;
    webgl_renderer: string;
    canvas_hash: string;
    audio_hash: string;
    do_not_track: DoNotTrack;
    cookies_enabled: boolean;
    local_storage: boolean;
    session_storage: boolean;
    indexed_db: boolean;
    mac_address: string;
    fingerprint_hash: string;
}
