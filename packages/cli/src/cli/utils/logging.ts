import * as path from 'path';
import { createLogger, type Logger, type LoggerConfigInput, type LogLevel } from '@neurobik/core';

export const DEFAULT_LOG_FILE = 'neurobik.log';
export const LOG_FILE_MAX_SIZE = 10 * 1024 * 1024;

/**
 * CLI logger: always a rotating file log, plus console output at debug level.
 */
export function createCliLogger(options: { level?: LogLevel; logFile?: string } = {}): Logger {
    const level = options.level ?? 'info';
    const transports: NonNullable<LoggerConfigInput['transports']> = [
        {
            type: 'file',
            path: path.resolve(options.logFile ?? DEFAULT_LOG_FILE),
            maxSize: LOG_FILE_MAX_SIZE,
        },
    ];
    if (level === 'debug' || level === 'silly') {
        transports.push({ type: 'console' });
    }
    return createLogger({ config: { level, transports } });
}
