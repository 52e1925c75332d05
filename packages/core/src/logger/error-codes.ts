/**
 * Logger-specific error codes
 */
export enum LoggerErrorCode {
    INVALID_CONFIG = 'logger_invalid_config',
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
