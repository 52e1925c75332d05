import { NeurobikBaseError } from './NeurobikBaseError.js';
import type { Issue } from './types.js';

/**
 * Thrown when one or more validation issues of severity `error` were found.
 * Warnings ride along so callers can still surface them.
 */
export class NeurobikValidationError extends NeurobikBaseError {
    public readonly issues: Issue[];

    constructor(issues: Issue[]) {
        super(NeurobikValidationError.formatMessage(issues));
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    private static formatMessage(issues: Issue[]): string {
        const errors = issues.filter((i) => i.severity === 'error');
        if (errors.length === 0) {
            return 'Validation failed';
        }
        if (errors.length === 1 && errors[0]) {
            return NeurobikValidationError.formatIssue(errors[0]);
        }
        return `Validation failed with ${errors.length} errors:\n${errors
            .map((i) => `  - ${NeurobikValidationError.formatIssue(i)}`)
            .join('\n')}`;
    }

    private static formatIssue(issue: Issue): string {
        return issue.path && issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
        };
    }
}
