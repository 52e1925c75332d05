/**
 * Logger Factory
 *
 * Bridges raw logger configuration and the NeurobikLogger implementation.
 */

import { LoggerConfigSchema, LogLevelSchema, type LoggerConfigInput } from './schemas.js';
import { LOG_LEVELS, LogComponent, type Logger, type LogLevel } from './types.js';
import { NeurobikLogger } from './neurobik-logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config?: LoggerConfigInput;
    /** Component identifier (defaults to CLI) */
    component?: LogComponent;
}

/**
 * Create a logger instance from configuration.
 * `NEUROBIK_LOG_LEVEL` overrides the configured level when set.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'debug', transports: [{ type: 'file', path: '/tmp/neurobik.log' }] },
 * });
 *
 * logger.info('Run started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
    const parsed = LoggerConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
        throw LoggerError.invalidConfig(parsed.error.issues.map((i) => i.message).join('; '), {
            issues: parsed.error.issues,
        });
    }

    const level = resolveLogLevel(process.env.NEUROBIK_LOG_LEVEL) ?? parsed.data.level;

    return new NeurobikLogger({
        level,
        component: options.component ?? LogComponent.CLI,
        transports: createTransports(parsed.data.transports),
    });
}

/**
 * Parse a user-supplied level. Undefined/empty yields undefined; anything else
 * must be a known level.
 */
export function resolveLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    const parsed = LogLevelSchema.safeParse(value.trim().toLowerCase());
    if (!parsed.success) {
        throw LoggerError.invalidLogLevel(value, LOG_LEVELS);
    }
    return parsed.data;
}
