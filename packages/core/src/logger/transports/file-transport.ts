/**
 * File Transport
 *
 * Logs JSON lines to a file with automatic rotation based on file size.
 * Keeps a configurable number of rotated log files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    private isRotating: boolean = false;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.openStream();
    }

    private openStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, {
            flags: 'a',
            encoding: 'utf8',
        });

        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            this.rotate().catch((error: unknown) => {
                console.error('FileTransport rotation error:', error);
            });
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Renames current file to .1 and shifts existing rotated files up (.1 -> .2, etc.),
     * dropping the oldest, then flushes buffered lines.
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }

        this.isRotating = true;

        try {
            await this.closeStream();

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.writeStream = this.openStream();
        } finally {
            this.isRotating = false;
        }

        await this.flushPendingLogs();
    }

    private async flushPendingLogs(): Promise<void> {
        while (this.pendingLogs.length > 0 && this.writeStream) {
            const line = this.pendingLogs.shift();
            if (line === undefined) break;
            const lineSize = Buffer.byteLength(line, 'utf8');

            if (this.currentSize > 0 && this.currentSize + lineSize > this.maxSize) {
                this.pendingLogs.unshift(line);
                await this.rotate();
                break;
            }

            this.writeStream.write(line);
            this.currentSize += lineSize;
        }
    }

    private closeStream(): Promise<void> {
        const stream = this.writeStream;
        this.writeStream = null;
        if (!stream) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            stream.end(() => resolve());
        });
    }

    getFilePath(): string {
        return this.filePath;
    }

    destroy(): Promise<void> {
        return this.closeStream();
    }
}

async function renameIfExists(from: string, to: string): Promise<void> {
    try {
        await fs.promises.rename(from, to);
    } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
            throw error;
        }
    }
}
