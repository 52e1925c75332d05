import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { calculateFileHash, parseChecksum, verifyChecksum } from './checksum.js';

// sha256("hello world")
const HELLO_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';
// md5("hello world")
const HELLO_MD5 = '5eb63bbbe01eeed093cb22bb8f5acdc3';

describe('parseChecksum', () => {
    it('treats bare hex as sha256', () => {
        expect(parseChecksum(HELLO_SHA256)).toEqual({ algorithm: 'sha256', digest: HELLO_SHA256 });
    });

    it('accepts an algorithm prefix and normalizes case', () => {
        expect(parseChecksum('MD5:5EB63BBBE01EEED093CB22BB8F5ACDC3')).toEqual({
            algorithm: 'md5',
            digest: HELLO_MD5,
        });
    });

    it('rejects unknown algorithms and non-hex digests', () => {
        expect(parseChecksum('crc32:abcd')).toBeNull();
        expect(parseChecksum('sha256:not-hex')).toBeNull();
    });
});

describe('verifyChecksum', () => {
    let tempDir: string;
    let filePath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'neurobik-checksum-test-'));
        filePath = path.join(tempDir, 'model.gguf');
        await fs.writeFile(filePath, 'hello world');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('hashes the full file', async () => {
        expect(await calculateFileHash(filePath)).toBe(HELLO_SHA256);
        expect(await calculateFileHash(filePath, 'md5')).toBe(HELLO_MD5);
    });

    it('skips verification when no checksum is configured', async () => {
        expect(await verifyChecksum(filePath, undefined)).toEqual({ status: 'skipped' });
    });

    it('reports a match', async () => {
        expect(await verifyChecksum(filePath, `sha256:${HELLO_SHA256}`)).toEqual({
            status: 'match',
            algorithm: 'sha256',
            digest: HELLO_SHA256,
        });
    });

    it('reports a mismatch with both digests and leaves the file in place', async () => {
        const expected = 'a'.repeat(64);
        expect(await verifyChecksum(filePath, expected)).toEqual({
            status: 'mismatch',
            algorithm: 'sha256',
            expected,
            actual: HELLO_SHA256,
        });
        await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe('hello world');
    });

    it('rejects when the file is missing', async () => {
        await expect(
            verifyChecksum(path.join(tempDir, 'missing.gguf'), HELLO_SHA256)
        ).rejects.toThrow();
    });
});
