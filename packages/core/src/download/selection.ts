/**
 * Which configured items are still eligible for action.
 */

import type { ConfirmationStore } from './confirmation-store.js';
import type { DownloadItem, ModelItem, NeurobikConfig, OciItem } from './types.js';

export interface PendingItems {
    models: ModelItem[];
    oci: OciItem[];
}

export interface SelectableItem {
    id: string;
    label: string;
    kind: DownloadItem['kind'];
    hint?: string;
}

/**
 * Stable identity of an item for the selection surface.
 * Confirmation files are unique per item (enforced by config validation).
 */
export function itemId(item: DownloadItem): string {
    return `${item.kind}:${item.confirmationFile}`;
}

export function itemLabel(item: DownloadItem): string {
    return item.kind === 'model' ? `model: ${item.modelName}` : `oci: ${item.image}`;
}

/**
 * Models whose per-item marker is missing, plus every OCI item (image state is
 * never inspected locally, so pulls/builds are always offered). Config order is kept.
 */
export async function selectPendingItems(
    config: NeurobikConfig,
    store: ConfirmationStore
): Promise<PendingItems> {
    const models: ModelItem[] = [];
    for (const model of config.models) {
        if (!(await store.exists(model.confirmationFile))) {
            models.push(model);
        }
    }
    return { models, oci: [...config.oci] };
}

export function toSelectableItems(pending: PendingItems): SelectableItem[] {
    const items: DownloadItem[] = [...pending.models, ...pending.oci];
    return items.map((item) => ({
        id: itemId(item),
        label: itemLabel(item),
        kind: item.kind,
        hint: item.kind === 'model' ? item.repoName : item.containerfile ? 'build' : 'pull',
    }));
}

/**
 * Map chosen ids back to items in config order (models first, then OCI),
 * whatever order the selection surface returned them in. Unknown ids are ignored.
 */
export function orderBySelection(config: NeurobikConfig, chosenIds: Iterable<string>): DownloadItem[] {
    const chosen = new Set(chosenIds);
    const ordered: DownloadItem[] = [...config.models, ...config.oci];
    return ordered.filter((item) => chosen.has(itemId(item)));
}
