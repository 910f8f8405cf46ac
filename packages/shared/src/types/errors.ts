/**
 * Error hierarchy for Persona Forge
 * Typed errors with classification, context and a stable grouping key
 */

import logger from '../utils/logger.js';

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    PERMANENT = 'permanent',        // Same input fails the same way (bad pins, bad count)
    OPERATIONAL = 'operational',    // I/O or internal failure
    ENVIRONMENT = 'environment'     // The host cannot serve the request (no entropy, bad config)
}

/**
 * Failure Point - Where in the pipeline the error occurred
 */
export enum FailurePoint {
    INPUT_VALIDATION = 'input_validation',
    CONSTRAINT_RESOLUTION = 'constraint_resolution',
    CATALOG_LOOKUP = 'catalog_lookup',
    ENTROPY = 'entropy',
    IDENTITY_GENERATION = 'identity_generation',
    PERSISTENCE = 'persistence',
    CONFIGURATION = 'configuration',
    UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

export interface ValidationIssue {
    field: string;
    message: string;
}

export interface ApplicationErrorOptions {
    retryable?: boolean;
    fatal?: boolean;
    context?: ErrorContext;
    category?: ErrorCategory;
    failurePoint?: FailurePoint;
    cause?: unknown;
}

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly retryable: boolean;
    public readonly fatal: boolean;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;

    constructor(
        message: string,
        public readonly code: string,
        options: ApplicationErrorOptions = {}
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.retryable = options.retryable ?? false;
        this.fatal = options.fatal ?? false;
        this.context = options.context;
        this.category = options.category ?? (this.retryable ? ErrorCategory.OPERATIONAL : ErrorCategory.PERMANENT);
        this.failurePoint = options.failurePoint ?? FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            retryable: this.retryable,
            fatal: this.fatal,
            category: this.category,
            failurePoint: this.failurePoint,
            timestamp: this.timestamp.toISOString(),
            context: this.context,
            stack: this.stack
        };
    }

    /**
     * Get a unique key for error grouping
     */
    getGroupingKey(): string {
        return `${this.code}:${this.failurePoint}`;
    }
}

// ==========================================
// Caller Errors (not retryable)
// ==========================================

export class InvalidArgumentError extends ApplicationError {
    constructor(message: string, public readonly issues: ValidationIssue[] = [], context?: ErrorContext) {
        super(message, 'INVALID_ARGUMENT', {
            context: { issues, ...context },
            category: ErrorCategory.PERMANENT,
            failurePoint: FailurePoint.INPUT_VALIDATION
        });
    }
}

export interface PinnedSelection {
    deviceType?: string;
    browser?: string;
    os?: string;
}

export class ConstraintConflictError extends ApplicationError {
    constructor(message: string, public readonly constraints: PinnedSelection, context?: ErrorContext) {
        super(message, 'CONSTRAINT_CONFLICT', {
            context: { constraints, ...context },
            category: ErrorCategory.PERMANENT,
            failurePoint: FailurePoint.CONSTRAINT_RESOLUTION
        });
    }
}

export class CatalogError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(message, 'CATALOG_ERROR', {
            fatal: true,
            context,
            category: ErrorCategory.PERMANENT,
            failurePoint: FailurePoint.CATALOG_LOOKUP
        });
    }
}

export class ConfigurationError extends ApplicationError {
    constructor(message: string, public readonly issues: ValidationIssue[] = [], context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', {
            context: { issues, ...context },
            category: ErrorCategory.ENVIRONMENT,
            failurePoint: FailurePoint.CONFIGURATION
        });
    }
}

// ==========================================
// Environment / Operational Errors
// ==========================================

export class EntropySourceUnavailableError extends ApplicationError {
    constructor(cause?: unknown) {
        super('System entropy source is unavailable', 'ENTROPY_UNAVAILABLE', {
            fatal: true,
            cause,
            category: ErrorCategory.ENVIRONMENT,
            failurePoint: FailurePoint.ENTROPY
        });
    }
}

export class PersistenceError extends ApplicationError {
    constructor(message: string, public readonly path?: string, cause?: unknown) {
        super(message, 'PERSISTENCE_ERROR', {
            retryable: true,
            cause,
            context: { path },
            category: ErrorCategory.OPERATIONAL,
            failurePoint: FailurePoint.PERSISTENCE
        });
    }
}

export class InternalError extends ApplicationError {
    constructor(message: string = 'Internal error', context?: ErrorContext) {
        super(message, 'INTERNAL_ERROR', {
            context,
            category: ErrorCategory.OPERATIONAL
        });
    }
}

// ==========================================
// Error Utilities
// ==========================================

export function isAppError(error: unknown): error is ApplicationError {
    return error instanceof ApplicationError;
}

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalError(error.message, { originalError: error.name, stack: error.stack });
    }
    return new InternalError('Unknown error occurred', { error: String(error) });
}

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            failurePoint: appError.failurePoint,
            retryable: appError.retryable,
            context: appError.context,
            stack: appError.stack
        },
        ...context
    };

    if (appError.fatal || appError.category === ErrorCategory.OPERATIONAL) {
        logger.error(logData, 'Generation failed');
    } else {
        logger.warn(logData, 'Generation request rejected');
    }
}
