// Catalog
export * from './catalog/attribute-catalog.js';

// Randomness
export * from './random/random-source.js';

// Fingerprints
export * from './fingerprint/constraint-resolver.js';
export * from './fingerprint/field-synthesizer.js';
export * from './fingerprint/hash-deriver.js';
export * from './fingerprint/user-agent.js';
export * from './fingerprint/fingerprint-generator.js';
export * from './fingerprint/fingerprint-json.js';

// Identities
export * from './identity/identity-generator.js';
export * from './identity/identity-json.js';

// Types
export * from './types/errors.js';
export * from './types/fingerprint.interface.js';
export * from './types/identity.interface.js';

// Utils
export { default as logger, contextStorage, type LogContext } from './utils/logger.js';
export * from './utils/env-validator.js';
export * from './utils/validation.js';
