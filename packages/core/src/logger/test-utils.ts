/**
 * In-memory logger for tests. Every child writes into the parent's `entries`,
 * so a test can assert on what the orchestrator or adapter logged and under
 * which component.
 */

import { LogComponent, type LogEntry, type Logger, type LogLevel } from './types.js';

export class RecordingLogger implements Logger {
    constructor(
        readonly entries: LogEntry[] = [],
        private readonly component: LogComponent = LogComponent.CLI
    ) {}

    debug(message: string, context?: Record<string, unknown>): void {
        this.record('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.record('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.record('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.record('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.record('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.record('error', error.message, { ...context, errorName: error.name });
    }

    createChild(component: LogComponent): RecordingLogger {
        return new RecordingLogger(this.entries, component);
    }

    getLogFilePath(): string | null {
        return null;
    }

    async destroy(): Promise<void> {}

    /** Messages logged at `level`, in order */
    messages(level: LogLevel): string[] {
        return this.entries.filter((e) => e.level === level).map((e) => e.message);
    }

    private record(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        this.entries.push({
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        });
    }
}
