/**
 * Content digests for downloaded artifacts.
 */

import { createReadStream } from 'fs';
import { createHash } from 'crypto';

export const CHECKSUM_ALGORITHMS = ['sha256', 'sha512', 'sha1', 'md5'] as const;
export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

const DEFAULT_ALGORITHM: ChecksumAlgorithm = 'sha256';

/** Files are hashed in chunks of this size, never loaded whole. */
const CHUNK_SIZE = 1024 * 1024;

export interface ParsedChecksum {
    algorithm: ChecksumAlgorithm;
    digest: string;
}

function isChecksumAlgorithm(value: string): value is ChecksumAlgorithm {
    return CHECKSUM_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Parse `<algorithm>:<hex>` or bare hex (sha256).
 * Returns null for an unknown algorithm or a non-hex digest.
 */
export function parseChecksum(checksum: string): ParsedChecksum | null {
    const trimmed = checksum.trim();
    const separator = trimmed.indexOf(':');
    const algorithm = separator === -1 ? DEFAULT_ALGORITHM : trimmed.slice(0, separator).toLowerCase();
    const digest = (separator === -1 ? trimmed : trimmed.slice(separator + 1)).toLowerCase();

    if (!isChecksumAlgorithm(algorithm) || !/^[0-9a-f]+$/.test(digest)) {
        return null;
    }
    return { algorithm, digest };
}

/**
 * Calculate the hex digest of a file.
 */
export async function calculateFileHash(
    filePath: string,
    algorithm: ChecksumAlgorithm = DEFAULT_ALGORITHM
): Promise<string> {
    return new Promise((resolve, reject) => {
        const hash = createHash(algorithm);
        const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });

        stream.on('data', (chunk) => hash.update(chunk));
        stream.on('end', () => resolve(hash.digest('hex')));
        stream.on('error', reject);
    });
}

export type ChecksumVerification =
    | { status: 'skipped' }
    | { status: 'match'; algorithm: ChecksumAlgorithm; digest: string }
    | { status: 'mismatch'; algorithm: ChecksumAlgorithm; expected: string; actual: string };

/**
 * Compare a file against its expected checksum. An absent checksum passes trivially.
 * Throws only when the file cannot be read or the checksum is malformed.
 */
export async function verifyChecksum(
    filePath: string,
    expected: string | undefined
): Promise<ChecksumVerification> {
    if (expected === undefined || expected.trim() === '') {
        return { status: 'skipped' };
    }

    const parsed = parseChecksum(expected);
    if (!parsed) {
        throw new Error(`Unsupported checksum format: ${expected}`);
    }

    const actual = await calculateFileHash(filePath, parsed.algorithm);
    if (actual === parsed.digest) {
        return { status: 'match', algorithm: parsed.algorithm, digest: actual };
    }
    return { status: 'mismatch', algorithm: parsed.algorithm, expected: parsed.digest, actual };
}
