import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { DownloadError, type ModelItem, type OciItem, type RunSummary } from '@neurobik/core';
import { formatBytes, formatResultLine, summaryLines } from './report.js';
import { describeFatalError } from './errors.js';

const model: ModelItem = {
    kind: 'model',
    repoName: 'test-org/A-GGUF',
    modelName: 'a.gguf',
    location: '/m/a.gguf',
    confirmationFile: '/m/a.confirmed',
};

const image: OciItem = {
    kind: 'oci',
    image: 'quay.io/test/app',
    confirmationFile: '/o/app.confirmed',
    buildArgs: [],
};

describe('report', () => {
    let previousLevel: typeof chalk.level;

    beforeAll(() => {
        previousLevel = chalk.level;
        chalk.level = 0;
    });

    afterAll(() => {
        chalk.level = previousLevel;
    });

    it('formats one line per outcome', () => {
        expect(formatResultLine({ status: 'success', item: model })).toBe('✓ model: a.gguf');
        expect(formatResultLine({ status: 'skipped', item: model })).toBe(
            '- model: a.gguf (already complete)'
        );
        expect(
            formatResultLine({
                status: 'failed',
                item: image,
                error: DownloadError.transferFailed('quay.io/test/app', 'podman pull quay.io/test/app exited with code 125'),
            })
        ).toBe(
            "✗ oci: quay.io/test/app: Failed to transfer 'quay.io/test/app': podman pull quay.io/test/app exited with code 125"
        );
    });

    it('summarizes counts and the default model', () => {
        const summary: RunSummary = {
            results: [
                { status: 'success', item: model },
                {
                    status: 'failed',
                    item: image,
                    error: DownloadError.transferFailed('quay.io/test/app', 'boom'),
                },
            ],
            defaultModel: { path: '/m/a.gguf', linkPath: '/m/default-model.gguf' },
        };

        expect(summaryLines(summary)).toEqual([
            '✓ model: a.gguf',
            "✗ oci: quay.io/test/app: Failed to transfer 'quay.io/test/app': boom",
            '',
            '1 completed, 1 failed',
            'Default model: /m/a.gguf',
        ]);
    });

    it('mentions a default link that could not be updated', () => {
        const lines = summaryLines({
            results: [{ status: 'success', item: model }],
            defaultLinkError: DownloadError.defaultLinkConflict('/m/default-model.gguf'),
        });

        expect(lines.at(-1)).toBe(
            'Default model link not updated: Cannot create default model link: /m/default-model.gguf exists and is not a symlink'
        );
    });

    it('formats byte counts', () => {
        expect(formatBytes(512)).toBe('512 B');
        expect(formatBytes(1536)).toBe('1.5 KB');
        expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.0 GB');
    });

    it('describes fatal errors with their recovery hint', () => {
        expect(
            describeFatalError(DownloadError.missingPrerequisiteTool('podman', 'pulling images', 'Install podman'))
        ).toEqual(['podman is not installed but is required for pulling images', '→ Install podman']);
    });
});
