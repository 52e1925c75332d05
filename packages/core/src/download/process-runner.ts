/**
 * External tool invocation.
 *
 * Tools run with inherited stdio so their own progress output reaches the
 * terminal; output is never parsed. A non-zero exit is reported, not thrown.
 */

import { spawn, spawnSync } from 'child_process';

export interface CommandResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
}

export interface ProcessRunner {
    /**
     * Run a command to completion. Rejects only when the process cannot be spawned.
     */
    run(command: string, args: readonly string[]): Promise<CommandResult>;

    /**
     * Whether `<command> --version` can be executed successfully.
     */
    canRun(command: string): boolean;
}

export class SpawnProcessRunner implements ProcessRunner {
    run(command: string, args: readonly string[]): Promise<CommandResult> {
        return new Promise((resolve, reject) => {
            const child = spawn(command, [...args], { stdio: 'inherit' });

            child.once('error', reject);
            child.once('close', (exitCode, signal) => resolve({ exitCode, signal }));
        });
    }

    canRun(command: string): boolean {
        const result = spawnSync(command, ['--version'], {
            stdio: 'ignore',
            // Needed for Windows where tools are typically `.cmd` shims.
            shell: process.platform === 'win32',
        });

        if (result.error) {
            return false;
        }

        return result.status === 0;
    }
}

/**
 * Human-readable command line for logs and error messages.
 */
export function formatCommand(command: string, args: readonly string[]): string {
    return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export function describeExit(result: CommandResult): string {
    if (result.signal) {
        return `terminated by ${result.signal}`;
    }
    return `exited with code ${result.exitCode ?? 'unknown'}`;
}
