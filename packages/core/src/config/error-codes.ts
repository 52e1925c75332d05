/**
 * Configuration-specific error codes
 */
export enum ConfigErrorCode {
    // File operations
    FILE_NOT_FOUND = 'config_file_not_found',
    FILE_READ_ERROR = 'config_file_read_error',

    // Parsing
    PARSE_ERROR = 'config_parse_error',

    // Schema and cross-field validation
    VALIDATION_ERROR = 'config_validation_error',
}
