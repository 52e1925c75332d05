import { NeurobikRuntimeError } from '../errors/NeurobikRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 */
export class LoggerError {
    static invalidConfig(message: string, context?: Record<string, unknown>): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            LoggerErrorCode.INVALID_CONFIG,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid logger configuration: ${message}`,
            context
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): NeurobikRuntimeError {
        return new NeurobikRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels: [...validLevels] },
            `Use one of: ${validLevels.join(', ')}`
        );
    }
}
