import type { FingerprintJSON, FingerprintRecord } from '../types/fingerprint.interface.js';

export function toFingerprintJSON(record: FingerprintRecord): FingerprintJSON {
    return {
        user_agent: record.userAgent,
        browser_name: record.browserName,
        browser_version: record.browserVersion,
        browser_engine: record.browserEngine,
        platform: record.platform,
        os_name: record.osName,
        os_version: record.osVersion,
        device_type: record.deviceType,
        screen_width: record.screenWidth,
        screen_height: record.screenHeight,
        screen_resolution: record.screenResolution,
        color_depth: record.colorDepth,
        pixel_ratio: record.pixelRatio,
        language: record.language,
        languages: [...record.languages],
        timezone: record.timezone,
        timezone_offset: record.timezoneOffset,
        ip_address: record.ipAddress,
        connection_type: record.connectionType,
        cpu_cores: record.cpuCores,
        device_memory: record.deviceMemory,
        max_touch_points: record.maxTouchPoints,
        webgl_vendor: record.webglVendor,
        webgl_renderer: record.webglRenderer,
        canvas_hash: record.canvasHash,
        audio_hash: record.audioHash,
        do_not_track: record.doNotTrack,
        cookies_enabled: record.cookiesEnabled,
        local_storage: record.localStorage,
        session_storage: record.sessionStorage,
        indexed_db: record.indexedDb,
        mac_address: record.macAddress,
        fingerprint_hash: record.fingerprintHash
    };
}
