import { describe, it, expect } from 'vitest';
import { checkPrerequisites } from './prerequisites.js';
import { DownloadErrorCode } from './error-codes.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { planTransfer } from './providers/plan.js';
import { FakeProcessRunner, makeConfig, makeModel, makeOci } from './test-utils.js';

describe('checkPrerequisites', () => {
    const config = makeConfig();

    it('passes when every needed tool runs', () => {
        const runner = new FakeProcessRunner();
        const plans = [planTransfer(makeModel('/m', 'a'), config), planTransfer(makeOci('/o', 'img'), config)];

        expect(() => checkPrerequisites(plans, runner)).not.toThrow();
    });

    it('throws MissingPrerequisiteTool when podman is absent and an image is selected', () => {
        const runner = new FakeProcessRunner();
        runner.available.delete('podman');

        expect(() => checkPrerequisites([planTransfer(makeOci('/o', 'img'), config)], runner)).toThrow(
            expect.objectContaining({
                code: DownloadErrorCode.MISSING_PREREQUISITE_TOOL,
                scope: ErrorScope.DOWNLOAD,
                type: ErrorType.NOT_FOUND,
                message: 'podman is not installed but is required for pulling and building OCI images',
            })
        );
    });

    it('does not need podman when only models are selected', () => {
        const runner = new FakeProcessRunner();
        runner.available.delete('podman');

        expect(() => checkPrerequisites([planTransfer(makeModel('/m', 'a'), config)], runner)).not.toThrow();
    });

    it('needs nothing for an empty selection', () => {
        const runner = new FakeProcessRunner();
        runner.available.clear();

        expect(() => checkPrerequisites([], runner)).not.toThrow();
    });
});
