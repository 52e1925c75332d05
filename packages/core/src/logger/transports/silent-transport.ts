/**
 * Silent Transport
 *
 * A no-op transport that discards all log entries.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
