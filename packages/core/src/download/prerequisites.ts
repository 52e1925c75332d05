import type { Logger } from '../logger/types.js';
import { DownloadError } from './errors.js';
import type { ProcessRunner } from './process-runner.js';
import { requiredTools, type TransferPlan } from './providers/plan.js';
import { TOOLS } from './providers/tools.js';

/**
 * Verify every external tool the plans need is runnable.
 * Throws MissingPrerequisiteTool for the first one that is not; nothing has
 * been transferred at that point.
 */
export function checkPrerequisites(
    plans: readonly TransferPlan[],
    runner: ProcessRunner,
    logger?: Logger
): void {
    for (const tool of requiredTools(plans)) {
        const info = TOOLS[tool];
        if (!runner.canRun(tool)) {
            logger?.error(`Missing prerequisite: ${tool}`, { purpose: info.purpose });
            throw DownloadError.missingPrerequisiteTool(tool, info.purpose, info.installHint);
        }
        logger?.debug(`Found ${tool}`);
    }
}
