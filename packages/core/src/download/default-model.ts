/**
 * Maintains `default-model.<ext>`, a relative symlink to the preferred
 * completed model, and the provider-ready marker beside it.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { toRuntimeError } from '../errors/NeurobikRuntimeError.js';
import type { Logger } from '../logger/types.js';
import { ConfirmationStore, providerMarkerPath } from './confirmation-store.js';
import { DownloadError } from './errors.js';
import type { DefaultLinkOutcome, ModelItem, NeurobikConfig } from './types.js';

export const DEFAULT_LINK_BASENAME = 'default-model';

/**
 * The model the default link should point at: `defaultGguf` when that model is
 * complete, otherwise the first complete model in config order.
 */
export async function pickDefaultModel(
    config: Pick<NeurobikConfig, 'models' | 'defaultGguf'>,
    store: ConfirmationStore
): Promise<ModelItem | undefined> {
    if (config.defaultGguf !== undefined) {
        const preferred = config.models.find((model) => model.modelName === config.defaultGguf);
        if (preferred && (await store.exists(preferred.confirmationFile))) {
            return preferred;
        }
    }

    for (const model of config.models) {
        if (await store.exists(model.confirmationFile)) {
            return model;
        }
    }
    return undefined;
}

export function linkExtension(location: string): string {
    const ext = path.extname(location).slice(1);
    return ext === '' ? 'gguf' : ext;
}

async function lstatOrNull(filePath: string) {
    try {
        return await fs.lstat(filePath);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return null;
        }
        throw error;
    }
}

export class DefaultModelResolver {
    constructor(
        private store: ConfirmationStore,
        private logger?: Logger
    ) {}

    async resolve(config: Pick<NeurobikConfig, 'models' | 'defaultGguf'>): Promise<DefaultLinkOutcome> {
        const candidate = await pickDefaultModel(config, this.store);
        if (!candidate) {
            return { status: 'none' };
        }

        const modelsDir = path.dirname(candidate.confirmationFile);
        const linkName = `${DEFAULT_LINK_BASENAME}.${linkExtension(candidate.location)}`;
        const linkPath = path.join(modelsDir, linkName);
        const target = path.relative(modelsDir, candidate.location);

        try {
            await fs.mkdir(modelsDir, { recursive: true });
            const status = await this.placeLink(linkPath, target);
            await this.removeStaleLinks(modelsDir, linkName);

            const readyMarker = providerMarkerPath(modelsDir);
            if (!(await this.store.exists(readyMarker))) {
                await this.store.create(readyMarker);
            }

            this.logger?.info(`Default model link ${status}: ${linkPath} -> ${target}`);
            return { status, linkPath, target, modelPath: path.resolve(modelsDir, target) };
        } catch (error) {
            const runtimeError = toRuntimeError(error, (message) =>
                DownloadError.defaultLinkFailed(linkPath, message)
            );
            this.logger?.warn(runtimeError.message);
            return { status: 'failed', error: runtimeError };
        }
    }

    private async placeLink(linkPath: string, target: string): Promise<'linked' | 'unchanged'> {
        const existing = await lstatOrNull(linkPath);
        if (existing) {
            if (!existing.isSymbolicLink()) {
                throw DownloadError.defaultLinkConflict(linkPath);
            }
            if ((await fs.readlink(linkPath)) === target) {
                return 'unchanged';
            }
            await fs.unlink(linkPath);
        }
        await fs.symlink(target, linkPath);
        return 'linked';
    }

    private async removeStaleLinks(modelsDir: string, keep: string): Promise<void> {
        const entries = await fs.readdir(modelsDir);
        for (const entry of entries) {
            if (entry === keep || !entry.startsWith(`${DEFAULT_LINK_BASENAME}.`)) {
                continue;
            }
            const entryPath = path.join(modelsDir, entry);
            const stat = await lstatOrNull(entryPath);
            if (stat?.isSymbolicLink()) {
                await fs.unlink(entryPath);
                this.logger?.debug(`Removed stale default link ${entryPath}`);
            }
        }
    }
}
