/**
 * Neurobik Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';

export interface NeurobikLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: LogComponent;
    transports: LoggerTransport[];
}

/**
 * NeurobikLogger - Multi-transport logger with structured logging
 */
export class NeurobikLogger implements Logger {
    private level: LogLevel;
    private component: LogComponent;
    private transports: LoggerTransport[];

    // Lower number = more severe. With level 'debug' we log error, warn, info, debug but not silly.
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: NeurobikLoggerConfig) {
        this.level = config.level;
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return NeurobikLogger.LEVELS[level] <= NeurobikLogger.LEVELS[this.level];
    }

    createChild(component: LogComponent): NeurobikLogger {
        return new NeurobikLogger({ level: this.level, component, transports: this.transports });
    }

    getLogFilePath(): string | null {
        const fileTransport = this.transports.find(
            (t): t is FileTransport => t instanceof FileTransport
        );
        return fileTransport ? fileTransport.getFilePath() : null;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
