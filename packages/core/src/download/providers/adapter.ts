/**
 * Provider adapter: executes one transfer plan.
 *
 * Failures come back as a NeurobikRuntimeError value, never as a throw, so a
 * single item cannot abort the run.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { NeurobikRuntimeError } from '../../errors/NeurobikRuntimeError.js';
import { toRuntimeError } from '../../errors/NeurobikRuntimeError.js';
import type { Logger } from '../../logger/types.js';
import { DownloadError } from '../errors.js';
import { transferOverHttp, type HttpTransferOptions } from '../http-transfer.js';
import { describeExit, formatCommand, type CommandResult, type ProcessRunner } from '../process-runner.js';
import type { TransferProgress } from '../types.js';
import type { TransferPlan } from './plan.js';

export type AdapterOutcome = { ok: true } | { ok: false; error: NeurobikRuntimeError };

export interface ProviderAdapterOptions {
    runner: ProcessRunner;
    logger: Logger;
    onProgress?: (progress: TransferProgress) => void;
    signal?: AbortSignal;
}

type PlanOf<K extends TransferPlan['kind']> = Extract<TransferPlan, { kind: K }>;

export class ProviderAdapter {
    private runner: ProcessRunner;
    private logger: Logger;
    private onProgress: ((progress: TransferProgress) => void) | undefined;
    private signal: AbortSignal | undefined;

    constructor(options: ProviderAdapterOptions) {
        this.runner = options.runner;
        this.logger = options.logger;
        this.onProgress = options.onProgress;
        this.signal = options.signal;
    }

    async execute(plan: TransferPlan): Promise<AdapterOutcome> {
        const label = plan.item.kind === 'model' ? plan.item.modelName : plan.item.image;
        try {
            switch (plan.kind) {
                case 'hub-cli':
                    await this.pullFromHub(plan);
                    break;
                case 'http':
                    await this.fetchOverHttp(plan);
                    break;
                case 'oci-pull':
                case 'oci-build':
                    await this.runOciTool(plan);
                    break;
            }
            return { ok: true };
        } catch (error) {
            return {
                ok: false,
                error: toRuntimeError(error, (message) => DownloadError.transferFailed(label, message)),
            };
        }
    }

    private async pullFromHub(plan: PlanOf<'hub-cli'>): Promise<void> {
        const { item } = plan;
        await fs.mkdir(path.dirname(item.location), { recursive: true });
        await this.runTool(item.modelName, plan.tool, plan.args);

        if (plan.downloadedPath !== item.location) {
            await fs.rename(plan.downloadedPath, item.location);
        }

        try {
            await fs.access(item.location);
        } catch {
            throw DownloadError.transferFailed(
                item.modelName,
                `${plan.tool} finished but ${item.location} does not exist`
            );
        }
    }

    private async fetchOverHttp(plan: PlanOf<'http'>): Promise<void> {
        const options: HttpTransferOptions = {};
        if (this.onProgress) options.onProgress = this.onProgress;
        if (this.signal) options.signal = this.signal;

        this.logger.debug(`GET ${plan.url}`, { location: plan.item.location });
        const result = await transferOverHttp(plan.item, plan.url, options);
        this.logger.debug(`Downloaded ${result.sizeBytes} bytes`, {
            location: result.filePath,
            resumed: result.resumed,
        });
    }

    private async runOciTool(plan: PlanOf<'oci-pull' | 'oci-build'>): Promise<void> {
        await fs.mkdir(path.dirname(plan.item.confirmationFile), { recursive: true });
        await this.runTool(plan.item.image, plan.tool, plan.args);
    }

    private async runTool(label: string, tool: string, args: readonly string[]): Promise<void> {
        const commandLine = formatCommand(tool, args);
        this.logger.info(`Running ${commandLine}`);

        let result: CommandResult;
        try {
            result = await this.runner.run(tool, args);
        } catch (error) {
            throw DownloadError.transferFailed(
                label,
                `could not start ${tool}: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        if (result.exitCode !== 0) {
            throw DownloadError.transferFailed(label, `${commandLine} ${describeExit(result)}`);
        }
    }
}
