import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import {
    isHttpReference,
    partialPathFor,
    resolveArtifactUrl,
    transferOverHttp,
} from './http-transfer.js';
import { DownloadErrorCode } from './error-codes.js';
import { makeModel } from './test-utils.js';
import type { TransferProgress } from './types.js';

describe('http transfer', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'neurobik-http-test-'));
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('resolveArtifactUrl', () => {
        it('keeps a URL that already names the artifact', () => {
            expect(resolveArtifactUrl('https://files.test/dir/a.gguf', 'a.gguf')).toBe(
                'https://files.test/dir/a.gguf'
            );
        });

        it('appends the artifact name to a directory URL', () => {
            expect(resolveArtifactUrl('https://files.test/dir/', 'my model.gguf')).toBe(
                'https://files.test/dir/my%20model.gguf'
            );
        });

        it('throws TransferFailed for a reference that is not a URL', () => {
            expect(() => resolveArtifactUrl('https://bad host/x', 'a.gguf')).toThrow(
                expect.objectContaining({
                    code: DownloadErrorCode.TRANSFER_FAILED,
                    message: "Failed to transfer 'a.gguf': 'https://bad host/x' is not a valid URL",
                })
            );
        });
    });

    it('recognizes http and https references only', () => {
        expect(isHttpReference('https://files.test/a')).toBe(true);
        expect(isHttpReference('HTTP://files.test/a')).toBe(true);
        expect(isHttpReference('test-org/a-GGUF')).toBe(false);
    });

    it('writes the body to the location and reports final progress', async () => {
        const model = makeModel(path.join(tempDir, 'models'), 'a');
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => new Response('0123456789', { status: 200, headers: { 'content-length': '10' } }))
        );
        const progress: TransferProgress[] = [];

        const result = await transferOverHttp(model, 'https://files.test/a.gguf', {
            onProgress: (p) => progress.push(p),
        });

        expect(result).toEqual({ filePath: model.location, sizeBytes: 10, resumed: false });
        expect(await fs.readFile(model.location, 'utf-8')).toBe('0123456789');
        await expect(fs.access(partialPathFor(model.location))).rejects.toThrow();
        expect(progress.at(-1)).toMatchObject({ bytesDownloaded: 10, totalBytes: 10, percentage: 100 });
    });

    it('resumes a partial file with a Range request when the server answers 206', async () => {
        const model = makeModel(tempDir, 'a');
        await fs.writeFile(partialPathFor(model.location), '01234');
        const fetchMock = vi.fn(
            async (_url: string, _init?: RequestInit) =>
                new Response('56789', { status: 206, headers: { 'content-length': '5' } })
        );
        vi.stubGlobal('fetch', fetchMock);

        const result = await transferOverHttp(model, 'https://files.test/a.gguf');

        expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Range: 'bytes=5-' });
        expect(result).toEqual({ filePath: model.location, sizeBytes: 10, resumed: true });
        expect(await fs.readFile(model.location, 'utf-8')).toBe('0123456789');
    });

    it('starts over when the server ignores the Range header', async () => {
        const model = makeModel(tempDir, 'a');
        await fs.writeFile(partialPathFor(model.location), 'stale');
        vi.stubGlobal('fetch', vi.fn(async () => new Response('fresh body', { status: 200 })));

        const result = await transferOverHttp(model, 'https://files.test/a.gguf');

        expect(result.resumed).toBe(false);
        expect(await fs.readFile(model.location, 'utf-8')).toBe('fresh body');
    });

    it('fails on an HTTP error and keeps the partial file', async () => {
        const model = makeModel(tempDir, 'a');
        await fs.writeFile(partialPathFor(model.location), 'part');
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => new Response('', { status: 503, statusText: 'Service Unavailable' }))
        );

        await expect(transferOverHttp(model, 'https://files.test/a.gguf')).rejects.toThrow(
            expect.objectContaining({
                code: DownloadErrorCode.TRANSFER_FAILED,
                message: "Failed to transfer 'a.gguf': HTTP 503: Service Unavailable",
            })
        );
        expect(await fs.readFile(partialPathFor(model.location), 'utf-8')).toBe('part');
    });

    it('fails when the connection closes early', async () => {
        const model = makeModel(tempDir, 'a');
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => new Response('0123', { status: 200, headers: { 'content-length': '10' } }))
        );

        await expect(transferOverHttp(model, 'https://files.test/a.gguf')).rejects.toThrow(
            "Failed to transfer 'a.gguf': Connection closed after 4 of 10 bytes"
        );
        expect(await fs.readFile(partialPathFor(model.location), 'utf-8')).toBe('0123');
        await expect(fs.access(model.location)).rejects.toThrow();
    });

    it('reports an aborted request as interrupted', async () => {
        const model = makeModel(tempDir, 'a');
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
            })
        );

        await expect(transferOverHttp(model, 'https://files.test/a.gguf')).rejects.toThrow(
            expect.objectContaining({ code: DownloadErrorCode.TRANSFER_INTERRUPTED })
        );
    });
});
