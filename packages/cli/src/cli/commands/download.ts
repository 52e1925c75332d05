// packages/cli/src/cli/commands/download.ts

import * as p from '@clack/prompts';
import chalk from 'chalk';
import { z } from 'zod';
import {
    ConfirmationStore,
    LogComponent,
    LogLevelSchema,
    Orchestrator,
    isHttpReference,
    itemLabel,
    loadConfig,
    orderBySelection,
    selectPendingItems,
    toSelectableItems,
    type DownloadItem,
    type Logger,
    type OrchestratorEvents,
    type ProcessRunner,
} from '@neurobik/core';
import { createCliLogger } from '../utils/logging.js';
import { formatBytes, formatResultLine, renderBanner, renderSummary } from '../utils/report.js';
import { promptForSelection, type SelectionPrompt } from '../utils/selection-prompt.js';

const DownloadCommandSchema = z
    .object({
        config: z.string().min(1, 'Config path must not be empty'),
        all: z.boolean().default(false).describe('Take every pending item without prompting'),
        logLevel: LogLevelSchema.optional(),
        logFile: z.string().min(1).optional(),
    })
    .strict();

export type DownloadCommandOptions = z.output<typeof DownloadCommandSchema>;
export type DownloadCommandOptionsInput = z.input<typeof DownloadCommandSchema>;

/**
 * Collaborators the command can be given instead of the real ones.
 */
export interface DownloadCommandDeps {
    runner?: ProcessRunner;
    store?: ConfirmationStore;
    prompt?: SelectionPrompt;
    logger?: Logger;
}

function usesSpinner(item: DownloadItem): boolean {
    return item.kind === 'model' && isHttpReference(item.repoName);
}

/**
 * Progress display. External tools write straight to the terminal, so they
 * get a header line; direct HTTP transfers get a spinner with byte counts.
 */
function createProgressEvents(): OrchestratorEvents {
    let spinner: ReturnType<typeof p.spinner> | null = null;

    return {
        onItemStart: (item, index, total) => {
            const header = `[${index + 1}/${total}] ${itemLabel(item)}`;
            if (usesSpinner(item)) {
                spinner = p.spinner();
                spinner.start(header);
            } else {
                p.log.step(header);
            }
        },
        onProgress: (progress) => {
            const done = formatBytes(progress.bytesDownloaded);
            spinner?.message(
                progress.totalBytes > 0
                    ? `${progress.item.modelName} ${progress.percentage.toFixed(1)}% (${done} / ${formatBytes(progress.totalBytes)})`
                    : `${progress.item.modelName} ${done}`
            );
        },
        onItemComplete: (result) => {
            if (spinner) {
                spinner.stop(formatResultLine(result));
                spinner = null;
                return;
            }
            if (result.status === 'failed') {
                p.log.error(formatResultLine(result));
            } else {
                p.log.success(formatResultLine(result));
            }
        },
    };
}

/**
 * `neurobik download`: pick pending items, process them, report.
 *
 * Config and prerequisite errors are thrown. Per-item failures are reported
 * and reflected in the returned exit code.
 *
 * @returns process exit code: 1 when any selected item failed or the default
 * model link could not be placed, 0 otherwise
 */
export async function handleDownloadCommand(
    options: DownloadCommandOptionsInput,
    deps: DownloadCommandDeps = {}
): Promise<number> {
    const validated = DownloadCommandSchema.parse(options);
    const ownsLogger = deps.logger === undefined;
    const logger =
        deps.logger ??
        createCliLogger({
            ...(validated.logLevel !== undefined && { level: validated.logLevel }),
            ...(validated.logFile !== undefined && { logFile: validated.logFile }),
        });
    const store = deps.store ?? new ConfirmationStore();

    try {
        const config = await loadConfig(validated.config, logger.createChild(LogComponent.CONFIG));
        const pending = await selectPendingItems(config, store);

        if (pending.models.length === 0 && pending.oci.length === 0) {
            console.log('No items to download.');
            return 0;
        }

        let chosenIds: string[];
        if (validated.all) {
            chosenIds = toSelectableItems(pending).map((item) => item.id);
        } else {
            const answer = await (deps.prompt ?? promptForSelection)(toSelectableItems(pending));
            if (answer === null) {
                p.cancel('Download cancelled');
                return 0;
            }
            chosenIds = answer;
        }

        const selection = orderBySelection(config, chosenIds);
        if (selection.length === 0) {
            console.log('Nothing selected.');
            return 0;
        }

        console.log(renderBanner());
        logger.info(`Starting run with ${selection.length} item(s)`, { config: validated.config });
        logger.silly('Resolved configuration', { config });

        const orchestrator = new Orchestrator({
            config,
            logger,
            store,
            events: createProgressEvents(),
            ...(deps.runner && { runner: deps.runner }),
        });
        const summary = await orchestrator.run(selection);

        console.log(renderSummary(summary));
        let exitCode = 0;
        const failed = summary.results.filter((r) => r.status === 'failed').length;
        if (failed > 0) {
            logger.warn(`${failed} item(s) failed`);
            console.log(chalk.gray('Run the command again to retry failed items.'));
            exitCode = 1;
        }
        if (summary.defaultLinkError) {
            logger.warn(summary.defaultLinkError.message, { code: summary.defaultLinkError.code });
            if (summary.defaultLinkError.recovery) {
                console.log(chalk.gray(`→ ${summary.defaultLinkError.recovery}`));
            }
            exitCode = 1;
        }
        const logFilePath = logger.getLogFilePath();
        if (exitCode !== 0 && logFilePath !== null) {
            console.log(chalk.gray(`Details in ${logFilePath}`));
        }
        return exitCode;
    } catch (error) {
        if (error instanceof Error) {
            logger.trackException(error);
        } else {
            logger.error(String(error));
        }
        throw error;
    } finally {
        if (ownsLogger) {
            await logger.destroy();
        }
    }
}
