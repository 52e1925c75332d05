/**
 * Completion markers on the filesystem.
 *
 * A marker's existence, not its content, records that an item finished.
 * Markers are only ever created here; removing one by hand is how an
 * operator forces a re-download.
 */

import { promises as fs } from 'fs';
import * as path from 'path';

export const PROVIDER_READY_MARKER = '.neurobik-ready';

export class ConfirmationStore {
    async exists(markerPath: string): Promise<boolean> {
        try {
            await fs.access(markerPath);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Create (or replace) an empty marker, creating parent directories as needed.
     */
    async create(markerPath: string): Promise<void> {
        await fs.mkdir(path.dirname(markerPath), { recursive: true });
        await fs.writeFile(markerPath, '');
    }
}

/**
 * Path of the provider-scope marker inside a models directory.
 */
export function providerMarkerPath(modelsDir: string): string {
    return path.join(modelsDir, PROVIDER_READY_MARKER);
}
