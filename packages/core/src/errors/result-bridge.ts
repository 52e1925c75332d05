import type { Result } from '../utils/result.js';
import { NeurobikValidationError } from './NeurobikValidationError.js';
import type { Logger } from '../logger/types.js';

/**
 * Bridge function to convert Result pattern to validation exceptions
 * Used at public API boundaries for validation flows
 *
 * @param result - The Result to check (typically from validation functions)
 * @param logger - Optional logger instance for logging
 * @returns The data if successful
 * @throws NeurobikValidationError if the result contains validation issues
 *
 * @example
 * ```typescript
 * const config = ensureOk(validateConfig(raw, configPath));
 * ```
 */
export function ensureOk<T, C>(result: Result<T, C>, logger?: Logger): T {
    if (result.ok) {
        return result.data;
    }

    logger?.error(
        `ensureOk: found validation errors, throwing NeurobikValidationError: ${result.issues
            .map((i) => i.message)
            .join('; ')}`
    );
    throw new NeurobikValidationError(result.issues);
}
