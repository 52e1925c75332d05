import { ZodError, type ZodIssue } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Result of a validation step. Warnings may accompany a successful result;
 * a failed result always carries at least one issue.
 */
export type Result<T, C = unknown> =
    | { ok: true; data: T; issues: Issue<C>[] }
    | { ok: false; issues: Issue<C>[] };

export const ok = <T, C = unknown>(data: T, issues: Issue<C>[] = []): Result<T, C> => ({
    ok: true,
    data,
    issues,
});

export const fail = <T, C = unknown>(issues: Issue<C>[]): Result<T, C> => ({
    ok: false,
    issues,
});

export function hasErrors<C>(issues: Issue<C>[]): boolean {
    return issues.some((i) => i.severity === 'error');
}

export function splitIssues<C>(issues: Issue<C>[]): { errors: Issue<C>[]; warnings: Issue<C>[] } {
    return {
        errors: issues.filter((i) => i.severity === 'error'),
        warnings: issues.filter((i) => i.severity === 'warning'),
    };
}

/**
 * Flatten a ZodError into issues. Union failures are expanded into the
 * issues of every failing branch so the operator sees the actual field.
 */
export function zodToIssues<C = unknown>(
    err: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue<C>[] {
    const issues: Issue<C>[] = [];

    const collect = (zodIssue: ZodIssue): void => {
        if (zodIssue.code === 'invalid_union' && zodIssue.unionErrors.length > 0) {
            for (const unionError of zodIssue.unionErrors) {
                unionError.issues.forEach(collect);
            }
            return;
        }
        issues.push({
            code: 'schema_validation',
            message: zodIssue.message,
            path: zodIssue.path,
            severity,
            scope,
            type: ErrorType.USER,
        });
    };

    err.issues.forEach(collect);
    return issues;
}
