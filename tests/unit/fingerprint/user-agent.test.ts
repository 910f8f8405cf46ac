import { describe, expect, it } from 'vitest';
import { buildUserAgent, formatOsToken, getDefaultCatalog } from '@persona-forge/shared';

const catalog = getDefaultCatalog();

function userAgent(browserKey: string, browserVersion: string, osKey: string, osVersion: string): string {
    return buildUserAgent({ browserKey, browserVersion, osKey, osVersion }, catalog.getOperatingSystem(osKey));
}

describe('formatOsToken', () => {
    it.each([
        ['windows', '10', 'Windows NT 10.0'],
        ['windows', '11', 'Windows NT 11.0'],
        ['macos', '14.2', 'Macintosh; Intel Mac OS X 14_2'],
        ['linux', 'x86_64', 'X11; Linux x86_64'],
        ['android', '14', 'Linux; Android 14'],
        ['ios', '17.2', 'iPhone; CPU iPhone OS 17_2 like Mac OS X']
    ])('should format %s %s', (osKey, osVersion, expected) => {
        expect(formatOsToken(osKey, osVersion, catalog.getOperatingSystem(osKey))).toBe(expected);
    });

    it('should fall back to the catalog template for other systems', () => {
        expect(formatOsToken('haiku', 'R1', { userAgentTemplate: 'Haiku {version}' })).toBe('Haiku R1');
    });
});

describe('buildUserAgent', () => {
    it('should build a chrome user agent', () => {
        expect(userAgent('chrome', '120.0.0.0', 'windows', '10')).toBe(
            'Mozilla/5.0 (Windows NT 10.0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
        );
    });

    it('should append the Edg token for edge', () => {
        expect(userAgent('edge', '119.0.0.0', 'windows', '11')).toBe(
            'Mozilla/5.0 (Windows NT 11.0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36 Edg/119.0.0.0'
        );
    });

    it('should build a firefox user agent with the rv token', () => {
        expect(userAgent('firefox', '121.0', 'linux', 'x86_64')).toBe(
            'Mozilla/5.0 (X11; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0'
        );
    });

    it('should build a safari user agent', () => {
        expect(userAgent('safari', '17.2', 'ios', '17.2')).toBe(
            'Mozilla/5.0 (iPhone; CPU iPhone OS 17_2 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15'
        );
    });

    it('should keep only the OS token for unknown browsers', () => {
        expect(userAgent('lynx', '2.9', 'android', '13')).toBe('Mozilla/5.0 (Linux; Android 13)');
    });
});
