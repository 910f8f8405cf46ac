import type { OperatingSystemEntry } from '../catalog/attribute-catalog.js';

export interface UserAgentParts {
    browserKey: string;
    browserVersion: string;
    osKey: string;
    osVersion: string;
}

/**
 * OS token that sits inside the parentheses of a user agent.
 */
export function formatOsToken(osKey: string, osVersion: string, os: Pick<OperatingSystemEntry, 'userAgentTemplate'>): string {
    switch (osKey) {
        case 'windows':
            return `Windows NT ${osVersion === '10' ? '10.0' : '11.0'}`;
        case 'macos':
            return `Macintosh; Intel Mac OS X ${osVersion.replaceAll('.', '_')}`;
        case 'linux':
            return `X11; Linux ${osVersion}`;
        case 'android':
            return `Linux; Android ${osVersion}`;
        case 'ios':
            return `iPhone; CPU iPhone OS ${osVersion.replaceAll('.', '_')} like Mac OS X`;
        default:
            return os.userAgentTemplate.replaceAll('{version}', osVersion);
    }
}

export function buildUserAgent(parts: UserAgentParts, os: Pick<OperatingSystemEntry, 'userAgentTemplate'>): string {
    const osToken = formatOsToken(parts.osKey, parts.osVersion, os);
    const version = parts.browserVersion;

    switch (parts.browserKey) {
        case 'chrome':
            return `Mozilla/5.0 (${osToken}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version} Safari/537.36`;
        case 'edge':
            return `Mozilla/5.0 (${osToken}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version} Safari/537.36 Edg/${version}`;
        case 'firefox':
            return `Mozilla/5.0 (${osToken}; rv:${version}) Gecko/20100101 Firefox/${version}`;
        case 'safari':
            return `Mozilla/5.0 (${osToken}) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/${version} Safari/605.1.15`;
        default:
            return `Mozilla/5.0 (${osToken})`;
    }
}
