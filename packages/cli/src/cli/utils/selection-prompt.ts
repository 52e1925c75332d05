import * as p from '@clack/prompts';
import type { SelectableItem } from '@neurobik/core';

/**
 * Ask which pending items to process. Resolves to the chosen ids, or null when
 * the prompt was cancelled.
 */
export type SelectionPrompt = (items: SelectableItem[]) => Promise<string[] | null>;

export const promptForSelection: SelectionPrompt = async (items) => {
    const selected = await p.multiselect({
        message: 'Select items to download',
        options: items.map((item) => ({
            value: item.id,
            label: item.label,
            ...(item.hint !== undefined && { hint: item.hint }),
        })),
        initialValues: items.map((item) => item.id),
        required: false,
    });

    if (p.isCancel(selected)) {
        return null;
    }
    return selected;
};
