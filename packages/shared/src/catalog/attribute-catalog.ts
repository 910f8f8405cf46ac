import { readFileSync } from 'fs';
import { z } from 'zod';
import { CatalogError } from '../types/errors.js';
import { DEVICE_CLASSES } from '../types/fingerprint.interface.js';
import logger from '../utils/logger.js';

const nonEmptyStrings = z.array(z.string().min(1)).nonempty();

const BrowserEntrySchema = z.object({
    name: z.string().min(1),
    engine: z.string().min(1),
    versions: nonEmptyStrings
});

const OperatingSystemEntrySchema = z.object({
    name: z.string().min(1),
    versions: nonEmptyStrings,
    platforms: nonEmptyStrings,
    userAgentTemplate: z.string().includes('{version}')
});

const ScreenEntrySchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    deviceClass: z.enum(DEVICE_CLASSES)
});

const TimezoneEntrySchema = z.object({
    name: z.string().min(1),
    offsetHours: z.number().min(-12).max(14)
});

const GpuEntrySchema = z.object({
    vendor: z.string().min(1),
    renderer: z.string().min(1)
});

const nonEmptyRecord = <T extends z.ZodTypeAny>(entry: T, table: string) =>
    z.record(z.string().min(1), entry).refine(
        (record) => Object.keys(record).length > 0,
        { message: `${table} table must not be empty` }
    );

export const CatalogDataSchema = z.object({
    browsers: nonEmptyRecord(BrowserEntrySchema, 'browsers'),
    operatingSystems: nonEmptyRecord(OperatingSystemEntrySchema, 'operatingSystems'),
    screens: z.array(ScreenEntrySchema).nonempty(),
    locales: z.array(z.string().regex(/^[a-z]{2,3}(-[A-Za-z0-9]+)*$/, 'Invalid language tag')).nonempty(),
    timezones: z.array(TimezoneEntrySchema).nonempty(),
    gpus: z.array(GpuEntrySchema).nonempty()
});

export type CatalogData = z.infer<typeof CatalogDataSchema>;
export type BrowserEntry = z.infer<typeof BrowserEntrySchema>;
export type OperatingSystemEntry = z.infer<typeof OperatingSystemEntrySchema>;
export type ScreenEntry = z.infer<typeof ScreenEntrySchema>;
export type TimezoneEntry = z.infer<typeof TimezoneEntrySchema>;
export type GpuEntry = z.infer<typeof GpuEntrySchema>;

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Read-only reference tables the fingerprint engine draws from.
 */
export class AttributeCatalog {
    private readonly browserKeyList: readonly string[];
    private readonly osKeyList: readonly string[];

    private constructor(private readonly data: Readonly<CatalogData>) {
        this.browserKeyList = Object.freeze(Object.keys(data.browsers));
        this.osKeyList = Object.freeze(Object.keys(data.operatingSystems));
    }

    /**
     * Validate raw table data and wrap it. Throws CatalogError listing every problem found.
     */
    static fromData(raw: unknown): AttributeCatalog {
        const result = CatalogDataSchema.safeParse(raw);
        if (!result.success) {
            const problems = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new CatalogError(`Attribute catalog is invalid: ${problems.join('; ')}`, { problems });
        }
        return new AttributeCatalog(deepFreeze(result.data));
    }

    get browserKeys(): readonly string[] {
        return this.browserKeyList;
    }

    get osKeys(): readonly string[] {
        return this.osKeyList;
    }

    get screens(): readonly ScreenEntry[] {
        return this.data.screens;
    }

    get locales(): readonly string[] {
        return this.data.locales;
    }

    get timezones(): readonly TimezoneEntry[] {
        return this.data.timezones;
    }

    get gpus(): readonly GpuEntry[] {
        return this.data.gpus;
    }

    hasBrowser(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data.browsers, key);
    }

    hasOperatingSystem(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data.operatingSystems, key);
    }

    getBrowser(key: string): BrowserEntry {
        if (!this.hasBrowser(key)) {
            throw new CatalogError(`Unknown browser key: ${key}`, { key, known: this.browserKeyList });
        }
        return this.data.browsers[key];
    }

    getOperatingSystem(key: string): OperatingSystemEntry {
        if (!this.hasOperatingSystem(key)) {
            throw new CatalogError(`Unknown operating system key: ${key}`, { key, known: this.osKeyList });
        }
        return this.data.operatingSystems[key];
    }
}

export const DEFAULT_CATALOG_URL = new URL('./attribute-catalog.json', import.meta.url);

/**
 * Load and validate a catalog from a JSON file.
 */
export function loadAttributeCatalog(source: URL | string = DEFAULT_CATALOG_URL): AttributeCatalog {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(source, 'utf8'));
    } catch (error) {
        throw new CatalogError(`Failed to read attribute catalog from ${String(source)}`, {
            reason: error instanceof Error ? error.message : String(error)
        });
    }

    const catalog = AttributeCatalog.fromData(raw);
    logger.debug({
        browsers: catalog.browserKeys.length,
        operatingSystems: catalog.osKeys.length,
        screens: catalog.screens.length
    }, 'Attribute catalog loaded');
    return catalog;
}

let defaultCatalog: AttributeCatalog | null = null;

/**
 * Process-wide catalog, loaded and validated on first use.
 */
export function getDefaultCatalog(): AttributeCatalog {
    if (!defaultCatalog) {
        defaultCatalog = loadAttributeCatalog();
    }
    return defaultCatalog;
}
