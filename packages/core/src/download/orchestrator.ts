/**
 * Runs the selected items one after another.
 *
 * State moves init -> selection-known -> processing(i) -> done. A missing
 * prerequisite aborts before any item is touched; every other failure,
 * planning included, is recorded against its item and the run continues
 * with the next one.
 */

import { toRuntimeError, type NeurobikRuntimeError } from '../errors/NeurobikRuntimeError.js';
import { LogComponent, type Logger } from '../logger/types.js';
import { verifyChecksum } from './checksum.js';
import { ConfirmationStore } from './confirmation-store.js';
import { DefaultModelResolver } from './default-model.js';
import { DownloadError } from './errors.js';
import { checkPrerequisites } from './prerequisites.js';
import { SpawnProcessRunner, type ProcessRunner } from './process-runner.js';
import { ProviderAdapter } from './providers/adapter.js';
import { planTransfer, type TransferPlan } from './providers/plan.js';
import { itemId, itemLabel, orderBySelection } from './selection.js';
import type {
    DefaultLinkOutcome,
    DownloadItem,
    ModelItem,
    NeurobikConfig,
    OrchestratorEvents,
    OrchestratorState,
    RunSummary,
    TransferResult,
} from './types.js';

/** An item with its plan, or the reason no plan could be made for it */
type PlannedItem =
    | { readonly item: DownloadItem; readonly plan: TransferPlan }
    | { readonly item: DownloadItem; readonly error: NeurobikRuntimeError };

export interface OrchestratorOptions {
    config: NeurobikConfig;
    logger: Logger;
    store?: ConfirmationStore;
    runner?: ProcessRunner;
    events?: OrchestratorEvents;
    /** Aborts an in-flight HTTP transfer; the partial file is kept */
    signal?: AbortSignal;
}

export class Orchestrator {
    private config: NeurobikConfig;
    private logger: Logger;
    private store: ConfirmationStore;
    private runner: ProcessRunner;
    private events: OrchestratorEvents;
    private adapter: ProviderAdapter;
    private resolver: DefaultModelResolver;
    private state: OrchestratorState = { phase: 'init' };

    constructor(options: OrchestratorOptions) {
        this.config = options.config;
        this.logger = options.logger.createChild(LogComponent.ORCHESTRATOR);
        this.store = options.store ?? new ConfirmationStore();
        this.runner = options.runner ?? new SpawnProcessRunner();
        this.events = options.events ?? {};
        this.adapter = new ProviderAdapter({
            runner: this.runner,
            logger: options.logger.createChild(LogComponent.DOWNLOAD),
            ...(this.events.onProgress && { onProgress: this.events.onProgress }),
            ...(options.signal && { signal: options.signal }),
        });
        this.resolver = new DefaultModelResolver(
            this.store,
            options.logger.createChild(LogComponent.CONFIRMATION)
        );
    }

    getState(): OrchestratorState {
        return this.state;
    }

    /**
     * Process the selected items in config order.
     *
     * @throws NeurobikRuntimeError with MISSING_PREREQUISITE_TOOL when a needed tool is absent
     */
    async run(selection: readonly DownloadItem[]): Promise<RunSummary> {
        const items = orderBySelection(this.config, selection.map(itemId));
        const planned = items.map((item) => this.planItem(item));
        this.state = { phase: 'selection-known', total: items.length };
        this.logger.info(`Selected ${items.length} item(s)`);

        const plans = planned.flatMap((entry) => ('plan' in entry ? [entry.plan] : []));
        checkPrerequisites(plans, this.runner, this.logger);

        const results: TransferResult[] = [];
        let linkOutcome: DefaultLinkOutcome = { status: 'none' };
        let modelSucceeded = false;

        const total = planned.length;
        for (const [index, entry] of planned.entries()) {
            const item = entry.item;
            this.state = { phase: 'processing', index, total };
            this.events.onItemStart?.(item, index, total);
            this.logger.info(`[${index + 1}/${total}] ${itemLabel(item)}`);

            const result = await this.processItem(entry);
            results.push(result);

            if (result.status === 'failed') {
                this.logger.warn(`${itemLabel(item)} failed: ${result.error.message}`, {
                    code: result.error.code,
                });
            } else {
                const verb = result.status === 'skipped' ? 'already complete' : 'done';
                this.logger.info(`${itemLabel(item)} ${verb}`);
            }

            if (result.status === 'success' && item.kind === 'model') {
                modelSucceeded = true;
                linkOutcome = await this.resolver.resolve(this.config);
            }

            this.events.onItemComplete?.(result, index, total);
        }

        const summary: RunSummary = {
            results,
            ...(modelSucceeded &&
                (linkOutcome.status === 'linked' || linkOutcome.status === 'unchanged') && {
                    defaultModel: { path: linkOutcome.modelPath, linkPath: linkOutcome.linkPath },
                }),
            ...(linkOutcome.status === 'failed' && { defaultLinkError: linkOutcome.error }),
        };
        this.state = { phase: 'done', summary };
        return summary;
    }

    private planItem(item: DownloadItem): PlannedItem {
        try {
            return { item, plan: planTransfer(item, this.config) };
        } catch (error) {
            const name = item.kind === 'model' ? item.modelName : item.image;
            return {
                item,
                error: toRuntimeError(error, (message) => DownloadError.transferFailed(name, message)),
            };
        }
    }

    private async processItem(entry: PlannedItem): Promise<TransferResult> {
        const item = entry.item;

        if (item.kind === 'model' && (await this.store.exists(item.confirmationFile))) {
            return { status: 'skipped', item };
        }

        if ('error' in entry) {
            return { status: 'failed', item, error: entry.error };
        }

        const outcome = await this.adapter.execute(entry.plan);
        if (!outcome.ok) {
            return { status: 'failed', item, error: outcome.error };
        }

        if (item.kind === 'model') {
            const checksumError = await this.verify(item);
            if (checksumError) {
                return { status: 'failed', item, error: checksumError };
            }
        }

        try {
            await this.store.create(item.confirmationFile);
        } catch (error) {
            return {
                status: 'failed',
                item,
                error: toRuntimeError(error, (message) =>
                    DownloadError.markerWriteFailed(item.confirmationFile, message)
                ),
            };
        }

        return { status: 'success', item };
    }

    private async verify(item: ModelItem): Promise<NeurobikRuntimeError | undefined> {
        try {
            const verification = await verifyChecksum(item.location, item.checksum);
            if (verification.status === 'mismatch') {
                return DownloadError.checksumMismatch(
                    item.modelName,
                    item.location,
                    verification.expected,
                    verification.actual
                );
            }
            if (verification.status === 'match') {
                this.logger.debug(`Checksum verified for ${item.modelName}`, {
                    algorithm: verification.algorithm,
                });
            }
            return undefined;
        } catch (error) {
            return toRuntimeError(error, (message) =>
                DownloadError.transferFailed(item.modelName, `checksum verification failed: ${message}`)
            );
        }
    }
}
