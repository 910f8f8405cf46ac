import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import { SUPPORTED_LOCALES } from '../types/identity.interface.js';
import logger from './logger.js';

/**
 * Environment validation
 * Parses every setting the generator reads once at startup; fails fast on bad values
 */

const positiveInt = z.coerce.number().int().positive();

const TRUTHY = ['true', '1', 'yes'];

const booleanFlag = (fallback: boolean) => z.string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform(value => TRUTHY.includes(value))
    .optional()
    .transform(value => value ?? fallback);

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // ==========================================
    // Logging
    // ==========================================
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // ==========================================
    // Profile Output
    // ==========================================
    PROFILE_OUTPUT_DIR: z.string().trim().min(1).default('profiles'),
    PROFILE_FILE_PREFIX: z.string().regex(/^[\w.-]*$/, 'Must only contain letters, digits, dot, dash or underscore').default('fake_profile_'),
    PROFILE_MAX_BATCH: positiveInt.default(10000),

    // ==========================================
    // Generation
    // ==========================================
    PROFILE_SEED: z.coerce.number().int().refine(Number.isSafeInteger, 'Must be a safe integer').optional(),
    PROFILE_LOCALE: z.enum(SUPPORTED_LOCALES).default('en_US'),
    PROFILE_INCLUDE_FINANCIAL: booleanFlag(true),
    PROFILE_INCLUDE_PROFESSIONAL: booleanFlag(true),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let validatedEnv: Environment | null = null;

/**
 * Parse an environment map. Throws ConfigurationError listing every invalid variable.
 */
export function parseEnvironment(source: Record<string, string | undefined> = process.env): Environment {
    const result = EnvironmentSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError('Environment validation failed', issues);
    }

    if (result.data.NODE_ENV === 'production' && (result.data.LOG_LEVEL === 'debug' || result.data.LOG_LEVEL === 'trace')) {
        logger.warn('Verbose logging enabled in production; resolved configurations will be logged for every fingerprint');
    }

    return result.data;
}

/**
 * Validate process.env on startup. Prints every problem and exits on failure.
 */
export function validateEnvironment(): Environment {
    try {
        validatedEnv = parseEnvironment(process.env);
        logger.debug({ nodeEnv: validatedEnv.NODE_ENV, outputDir: validatedEnv.PROFILE_OUTPUT_DIR }, 'Environment validation passed');
        return validatedEnv;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('❌ ENVIRONMENT VALIDATION FAILED\n');
            error.issues.forEach((issue, index) => {
                console.error(`${index + 1}. ${issue.field}: ${issue.message}`);
            });
            console.error('\n📝 Please check your .env file or environment variables.\n');
        } else {
            console.error('❌ ENVIRONMENT VALIDATION FAILED:', error);
        }

        process.exit(1);
    }
}

/**
 * Get validated environment (must call validateEnvironment() first)
 */
export function getEnv(): Environment {
    if (!validatedEnv) {
        throw new ConfigurationError('Environment not validated yet. Call validateEnvironment() at application startup.');
    }
    return validatedEnv;
}
