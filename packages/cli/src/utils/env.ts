import * as path from 'path';
import dotenv from 'dotenv';

/**
 * Variables from `.env` in the given directory, without touching process.env.
 * A missing file yields an empty object.
 */
export function loadDotEnv(dir: string = process.cwd()): Record<string, string> {
    const result = dotenv.config({ path: path.join(dir, '.env'), processEnv: {} });
    return result.parsed ?? {};
}

/**
 * Make `.env` values available for `$VAR` expansion in the config.
 * Variables already set in the shell win.
 */
export function applyDotEnv(dir: string = process.cwd()): void {
    for (const [key, value] of Object.entries(loadDotEnv(dir))) {
        if (process.env[key] === undefined || process.env[key] === '') {
            process.env[key] = value;
        }
    }
}
