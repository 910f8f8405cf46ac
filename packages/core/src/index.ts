export * from './services/profile.service.js';
export * from './storage/profile-writer.js';
export * from './cli/generate-request.schema.js';
export { runCli, USAGE, COUNT_PROMPT, type CliIO, type RunCliOptions } from './cli/run.js';
