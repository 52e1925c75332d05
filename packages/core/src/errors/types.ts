import type { ConfigErrorCode } from '../config/error-codes.js';
import type { DownloadErrorCode } from '../download/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Configuration file operations, parsing, validation
    DOWNLOAD = 'download', // Provider transfers, checksums, default model link
    CONFIRMATION = 'confirmation', // Completion markers on the filesystem
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    CLI = 'cli', // Command-line surface
}

/**
 * Error types describing the nature of the failure
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // permission denied
    NOT_FOUND = 'not_found', // file or tool doesn't exist
    CONFLICT = 'conflict', // something already occupies the target
    SYSTEM = 'system', // bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // external tool or remote server failures
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type NeurobikErrorCode = ConfigErrorCode | DownloadErrorCode | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: NeurobikErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
