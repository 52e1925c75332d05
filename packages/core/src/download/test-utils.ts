/**
 * Test helpers for the download domain: item builders and an in-process
 * stand-in for external tools.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { CommandResult, ProcessRunner } from './process-runner.js';
import type { ModelItem, NeurobikConfig, OciItem } from './types.js';

export function makeModel(dir: string, name: string, overrides: Partial<ModelItem> = {}): ModelItem {
    return {
        kind: 'model',
        repoName: `test-org/${name}-GGUF`,
        modelName: `${name}.gguf`,
        location: path.join(dir, `${name}.gguf`),
        confirmationFile: path.join(dir, `${name}.confirmed`),
        ...overrides,
    };
}

export function makeOci(dir: string, image: string, overrides: Partial<OciItem> = {}): OciItem {
    return {
        kind: 'oci',
        image,
        confirmationFile: path.join(dir, `${image.replace(/[^a-z0-9]+/gi, '_')}.confirmed`),
        buildArgs: [],
        ...overrides,
    };
}

export function makeConfig(overrides: Partial<NeurobikConfig> = {}): NeurobikConfig {
    return {
        modelProvider: 'llama.cpp',
        ociProvider: 'podman',
        models: [],
        oci: [],
        ...overrides,
    };
}

export interface RecordedCall {
    command: string;
    args: string[];
}

/**
 * Fake tool runner. `hf download <repo> <file> --local-dir <dir>` writes
 * `<dir>/<file>` with the configured content; podman succeeds without side
 * effects. Commands matched by `failWhen` exit with code 1 and write nothing.
 */
export class FakeProcessRunner implements ProcessRunner {
    readonly calls: RecordedCall[] = [];
    available = new Set(['hf', 'podman']);
    /** Artifact content by file name; defaults to `content of <file>` */
    contents: Record<string, string> = {};
    failWhen: (call: RecordedCall) => boolean = () => false;

    async run(command: string, args: readonly string[]): Promise<CommandResult> {
        const call = { command, args: [...args] };
        this.calls.push(call);

        if (!this.available.has(command)) {
            throw new Error(`spawn ${command} ENOENT`);
        }
        if (this.failWhen(call)) {
            return { exitCode: 1, signal: null };
        }

        if (command === 'hf' && args[0] === 'download') {
            const [, , file, , localDir] = args;
            if (file !== undefined && localDir !== undefined) {
                const target = path.join(localDir, file);
                await fs.mkdir(path.dirname(target), { recursive: true });
                await fs.writeFile(target, this.contents[file] ?? `content of ${file}`);
            }
        }
        return { exitCode: 0, signal: null };
    }

    canRun(command: string): boolean {
        return this.available.has(command);
    }
}
