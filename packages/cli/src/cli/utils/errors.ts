import chalk from 'chalk';
import { NeurobikRuntimeError, NeurobikValidationError } from '@neurobik/core';

/**
 * Lines describing a fatal error for the terminal.
 */
export function describeFatalError(error: unknown): string[] {
    if (error instanceof NeurobikValidationError) {
        return [
            chalk.red('Invalid configuration:'),
            ...error.errors.map((issue) =>
                issue.path && issue.path.length > 0
                    ? `  - ${issue.path.join('.')}: ${issue.message}`
                    : `  - ${issue.message}`
            ),
        ];
    }
    if (error instanceof NeurobikRuntimeError) {
        const lines = [chalk.red(error.message)];
        if (error.recovery) {
            lines.push(chalk.gray(`→ ${error.recovery}`));
        }
        return lines;
    }
    return [chalk.red(error instanceof Error ? error.message : String(error))];
}
