/**
 * Console Transport
 *
 * One line per entry: `<time> <LEVEL> <component> <message> key=value ...`.
 * Context keys such as `item` or `code` are appended as key=value pairs so a
 * run reads line by line next to the tools' own output.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.dim,
};

const LEVEL_WIDTH = 5;

export function formatContextValue(value: unknown): string {
    if (typeof value === 'string') {
        return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
    }
    if (value === undefined) {
        return 'undefined';
    }
    return JSON.stringify(value) ?? String(value);
}

export function formatConsoleLine(entry: LogEntry, colorize = false): string {
    const time = new Date(entry.timestamp).toISOString().slice(11, 19);
    const level = entry.level.toUpperCase().padEnd(LEVEL_WIDTH);
    const pairs = Object.entries(entry.context ?? {}).map(
        ([key, value]) => `${key}=${formatContextValue(value)}`
    );

    const head = colorize ? LEVEL_COLORS[entry.level](level) : level;
    const component = colorize ? chalk.bold(entry.component) : entry.component;
    return [time, head, component, entry.message, ...pairs].join(' ');
}

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const line = formatConsoleLine(entry, this.colorize);
        // stderr keeps stdout clean for the run report
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}
