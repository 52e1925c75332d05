/**
 * @neurobik/core - Main entry point
 *
 * Download orchestration for local model artifacts and OCI images, with
 * completion state kept on the filesystem.
 */

// Configuration
export * from './config/index.js';

// Download domain
export * from './download/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Utilities
export { expandEnvVars } from './utils/env.js';
export { ok, fail, hasErrors, splitIssues, zodToIssues, type Result } from './utils/result.js';
