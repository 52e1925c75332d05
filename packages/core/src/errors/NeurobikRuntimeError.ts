import { NeurobikBaseError } from './NeurobikBaseError.js';
import type { ErrorScope, ErrorType, NeurobikErrorCode } from './types.js';

/**
 * Runtime error with a typed code, the scope that raised it and an optional
 * recovery hint shown to the operator.
 *
 * @example
 * ```typescript
 * throw new NeurobikRuntimeError(
 *     DownloadErrorCode.TRANSFER_FAILED,
 *     ErrorScope.DOWNLOAD,
 *     ErrorType.THIRD_PARTY,
 *     'podman pull exited with code 125',
 *     { image },
 *     'Check the image reference and registry access'
 * );
 * ```
 */
export class NeurobikRuntimeError<C = Record<string, unknown>> extends NeurobikBaseError {
    public readonly code: NeurobikErrorCode | string;
    public readonly scope: ErrorScope | string;
    public readonly type: ErrorType;
    public readonly context: C | undefined;
    public readonly recovery: string | undefined;

    constructor(
        code: NeurobikErrorCode | string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        recovery?: string
    ) {
        super(message);
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
        this.recovery = recovery;
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            severity: 'error',
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}

/**
 * Wrap anything thrown into a NeurobikRuntimeError, keeping existing ones as-is.
 */
export function toRuntimeError(
    error: unknown,
    fallback: (message: string) => NeurobikRuntimeError
): NeurobikRuntimeError {
    if (error instanceof NeurobikRuntimeError) {
        return error;
    }
    return fallback(error instanceof Error ? error.message : String(error));
}

