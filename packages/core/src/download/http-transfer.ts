/**
 * Direct HTTP transfer of a model artifact.
 *
 * - Bytes go to `<target>.download` and are renamed into place when complete
 * - An existing `.download` file is resumed with a Range request
 * - Progress is reported at most every 100ms
 */

import { createWriteStream, promises as fs, type WriteStream } from 'fs';
import { once } from 'events';
import * as path from 'path';
import { DownloadError } from './errors.js';
import type { ModelItem, TransferProgress } from './types.js';

export interface HttpTransferOptions {
    onProgress?: (progress: TransferProgress) => void;
    signal?: AbortSignal;
}

export interface HttpTransferResult {
    filePath: string;
    sizeBytes: number;
    /** Whether the transfer continued a partial download */
    resumed: boolean;
}

const PROGRESS_INTERVAL_MS = 100;

export function partialPathFor(targetPath: string): string {
    return `${targetPath}.download`;
}

/**
 * URL of the artifact: the repository reference itself when it already ends in
 * the artifact name, otherwise the artifact name appended to it.
 */
export function resolveArtifactUrl(repoName: string, modelName: string): string {
    if (!URL.canParse(repoName)) {
        throw DownloadError.transferFailed(modelName, `'${repoName}' is not a valid URL`);
    }
    const url = new URL(repoName);
    const lastSegment = decodeURIComponent(url.pathname.split('/').filter(Boolean).pop() ?? '');
    if (lastSegment === modelName) {
        return url.toString();
    }
    url.pathname = `${url.pathname.replace(/\/+$/, '')}/${modelName
        .split('/')
        .map(encodeURIComponent)
        .join('/')}`;
    return url.toString();
}

export function isHttpReference(repoName: string): boolean {
    return /^https?:\/\//i.test(repoName);
}

async function getPartialSize(filePath: string): Promise<number> {
    try {
        const stats = await fs.stat(filePath);
        return stats.size;
    } catch {
        return 0;
    }
}

function createProgress(
    item: ModelItem,
    bytesDownloaded: number,
    totalBytes: number,
    speed?: number
): TransferProgress {
    return {
        item,
        bytesDownloaded,
        totalBytes,
        percentage: totalBytes > 0 ? (bytesDownloaded / totalBytes) * 100 : 0,
        ...(speed !== undefined && { speed }),
    };
}

async function closeStream(stream: WriteStream): Promise<void> {
    await new Promise<void>((resolve, reject) => {
        stream.end((err?: Error | null) => {
            if (err) reject(err);
            else resolve();
        });
    });
}

/**
 * Download `item` from `url` to `item.location`.
 * Throws a NeurobikRuntimeError (TRANSFER_FAILED / TRANSFER_INTERRUPTED) on failure;
 * the partial file is always left in place.
 */
export async function transferOverHttp(
    item: ModelItem,
    url: string,
    options: HttpTransferOptions = {}
): Promise<HttpTransferResult> {
    const targetPath = item.location;
    const tempPath = partialPathFor(targetPath);
    const partialSize = await getPartialSize(tempPath);

    const headers: Record<string, string> = {
        'User-Agent': 'neurobik',
    };
    if (partialSize > 0) {
        headers['Range'] = `bytes=${partialSize}-`;
    }

    await fs.mkdir(path.dirname(targetPath), { recursive: true });

    let response: Response;
    try {
        const init: RequestInit = { headers };
        if (options.signal) {
            init.signal = options.signal;
        }
        response = await fetch(url, init);
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw DownloadError.transferInterrupted(item.modelName, tempPath);
        }
        throw DownloadError.transferFailed(
            item.modelName,
            error instanceof Error ? error.message : String(error)
        );
    }

    // 416: the partial file already holds every byte the server has
    if (response.status === 416 && partialSize > 0) {
        await fs.rename(tempPath, targetPath);
        return { filePath: targetPath, sizeBytes: partialSize, resumed: true };
    }

    if (!response.ok) {
        throw DownloadError.transferFailed(
            item.modelName,
            `HTTP ${response.status}: ${response.statusText}`
        );
    }

    const reader = response.body?.getReader();
    if (!reader) {
        throw DownloadError.transferFailed(item.modelName, 'No response body');
    }

    // A 200 means the server ignored the Range header; start over
    const resumed = partialSize > 0 && response.status === 206;
    const startOffset = resumed ? partialSize : 0;
    const contentLengthHeader = response.headers.get('content-length');
    const contentLength = contentLengthHeader ? parseInt(contentLengthHeader, 10) : 0;
    const totalSize = contentLength > 0 ? startOffset + contentLength : 0;

    const writeStream = createWriteStream(tempPath, { flags: resumed ? 'a' : 'w' });

    let bytesDownloaded = startOffset;
    const startTime = Date.now();
    let lastProgressUpdate = 0;

    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) break;

            if (!writeStream.write(value)) {
                await once(writeStream, 'drain');
            }
            bytesDownloaded += value.length;

            const now = Date.now();
            if (options.onProgress && now - lastProgressUpdate >= PROGRESS_INTERVAL_MS) {
                lastProgressUpdate = now;
                const elapsedSeconds = (now - startTime) / 1000;
                const speed =
                    elapsedSeconds > 0 ? (bytesDownloaded - startOffset) / elapsedSeconds : 0;
                options.onProgress(createProgress(item, bytesDownloaded, totalSize, speed));
            }
        }
        await closeStream(writeStream);
    } catch (error) {
        writeStream.destroy();
        if (error instanceof Error && error.name === 'AbortError') {
            throw DownloadError.transferInterrupted(item.modelName, tempPath);
        }
        throw DownloadError.transferFailed(
            item.modelName,
            error instanceof Error ? error.message : String(error)
        );
    }

    if (totalSize > 0 && bytesDownloaded < totalSize) {
        throw DownloadError.transferFailed(
            item.modelName,
            `Connection closed after ${bytesDownloaded} of ${totalSize} bytes`
        );
    }

    await fs.rename(tempPath, targetPath);
    options.onProgress?.(createProgress(item, bytesDownloaded, bytesDownloaded));

    return { filePath: targetPath, sizeBytes: bytesDownloaded, resumed };
}
