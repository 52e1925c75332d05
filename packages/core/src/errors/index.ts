/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { NeurobikBaseError } from './NeurobikBaseError.js';
export { NeurobikRuntimeError, toRuntimeError } from './NeurobikRuntimeError.js';
export { NeurobikValidationError } from './NeurobikValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity, NeurobikErrorCode } from './types.js';
export { ensureOk } from './result-bridge.js';
