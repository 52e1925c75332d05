import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfirmationStore } from './confirmation-store.js';
import { DownloadErrorCode } from './error-codes.js';
import { Orchestrator } from './orchestrator.js';
import { selectPendingItems } from './selection.js';
import { FakeProcessRunner, makeConfig, makeModel, makeOci } from './test-utils.js';
import type {
    DownloadItem,
    NeurobikConfig,
    OrchestratorEvents,
    OrchestratorState,
} from './types.js';
import { RecordingLogger } from '../logger/test-utils.js';
import { LogComponent } from '../logger/types.js';

const HELLO_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';

describe('Orchestrator', () => {
    let tempDir: string;
    let modelsDir: string;
    let runner: FakeProcessRunner;
    let logger: RecordingLogger;
    const store = new ConfirmationStore();

    function orchestrator(config: NeurobikConfig, events: OrchestratorEvents = {}): Orchestrator {
        return new Orchestrator({ config, logger, store, runner, events });
    }

    function all(config: NeurobikConfig): DownloadItem[] {
        return [...config.models, ...config.oci];
    }

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(tmpdir(), 'neurobik-orchestrator-test-'));
        modelsDir = path.join(tempDir, 'models');
        runner = new FakeProcessRunner();
        logger = new RecordingLogger();
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('downloads everything, links the first model and marks the provider ready', async () => {
        const a = makeModel(modelsDir, 'a');
        const b = makeModel(modelsDir, 'b');
        const image = makeOci(path.join(tempDir, 'oci'), 'quay.io/test/app');
        const config = makeConfig({ models: [a, b], oci: [image] });

        const summary = await orchestrator(config).run(all(config));

        expect(summary.results.map((r) => r.status)).toEqual(['success', 'success', 'success']);
        for (const item of all(config)) {
            expect(await store.exists(item.confirmationFile)).toBe(true);
        }
        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('a.gguf');
        expect(await store.exists(path.join(modelsDir, '.neurobik-ready'))).toBe(true);
        expect(summary.defaultModel).toEqual({
            path: a.location,
            linkPath: path.join(modelsDir, 'default-model.gguf'),
        });
        expect(summary.defaultLinkError).toBeUndefined();
    });

    it('processes the selection in config order', async () => {
        const a = makeModel(modelsDir, 'a');
        const b = makeModel(modelsDir, 'b');
        const image = makeOci(tempDir, 'quay.io/test/app');
        const config = makeConfig({ models: [a, b], oci: [image] });

        const summary = await orchestrator(config).run([image, b, a]);

        expect(summary.results.map((r) => r.item)).toEqual([a, b, image]);
    });

    it('is idempotent: completed models are not fetched again', async () => {
        const a = makeModel(modelsDir, 'a');
        const config = makeConfig({ models: [a] });
        await orchestrator(config).run(all(config));
        runner.calls.length = 0;

        const pending = await selectPendingItems(config, store);
        const rerun = await orchestrator(config).run([a]);

        expect(pending.models).toEqual([]);
        expect(rerun.results).toEqual([{ status: 'skipped', item: a }]);
        expect(rerun.defaultModel).toBeUndefined();
        expect(runner.calls).toEqual([]);
        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('a.gguf');
    });

    it('continues after a failure and links the model that succeeded', async () => {
        const a = makeModel(modelsDir, 'a');
        const b = makeModel(modelsDir, 'b');
        const config = makeConfig({ models: [a, b] });
        runner.failWhen = (call) => call.args.includes('a.gguf');

        const summary = await orchestrator(config).run(all(config));

        expect(summary.results[0]).toMatchObject({
            status: 'failed',
            item: a,
            error: expect.objectContaining({ code: DownloadErrorCode.TRANSFER_FAILED }),
        });
        expect(summary.results[1]).toEqual({ status: 'success', item: b });
        expect(await store.exists(a.confirmationFile)).toBe(false);
        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('b.gguf');
        expect(summary.defaultModel?.path).toBe(b.location);
        expect(logger.messages('warn')).toEqual([expect.stringMatching(/^model: a\.gguf failed: /)]);
        expect(logger.entries.find((e) => e.level === 'warn')?.component).toBe(LogComponent.ORCHESTRATOR);
    });

    it('records an unusable download URL against its item and carries on', async () => {
        const a = makeModel(modelsDir, 'a', { repoName: 'https://bad host/x' });
        const b = makeModel(modelsDir, 'b');
        const config = makeConfig({ models: [a, b] });

        const summary = await orchestrator(config).run(all(config));

        expect(summary.results[0]).toEqual({
            status: 'failed',
            item: a,
            error: expect.objectContaining({
                code: DownloadErrorCode.TRANSFER_FAILED,
                message: "Failed to transfer 'a.gguf': 'https://bad host/x' is not a valid URL",
            }),
        });
        expect(summary.results[1]).toEqual({ status: 'success', item: b });
        expect(runner.calls.map((call) => call.args[1])).toEqual(['test-org/b-GGUF']);
        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('b.gguf');
    });

    it('moves the link back to the first model once it succeeds on a rerun', async () => {
        const a = makeModel(modelsDir, 'a');
        const b = makeModel(modelsDir, 'b');
        const config = makeConfig({ models: [a, b] });
        runner.failWhen = (call) => call.args.includes('a.gguf');
        await orchestrator(config).run(all(config));

        runner.failWhen = () => false;
        const pending = await selectPendingItems(config, store);
        const summary = await orchestrator(config).run(pending.models);

        expect(pending.models).toEqual([a]);
        expect(summary.results).toEqual([{ status: 'success', item: a }]);
        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('a.gguf');
        expect(summary.defaultModel?.path).toBe(a.location);
    });

    it('honors the preferred default model', async () => {
        const a = makeModel(modelsDir, 'a');
        const b = makeModel(modelsDir, 'b');
        const config = makeConfig({ models: [a, b], defaultGguf: 'b.gguf' });

        const summary = await orchestrator(config).run(all(config));

        expect(await fs.readlink(path.join(modelsDir, 'default-model.gguf'))).toBe('b.gguf');
        expect(summary.defaultModel?.path).toBe(b.location);
    });

    it('never marks a model whose checksum does not match', async () => {
        const a = makeModel(modelsDir, 'a', { checksum: `sha256:${'0'.repeat(64)}` });
        const b = makeModel(modelsDir, 'b', { checksum: HELLO_SHA256 });
        runner.contents['a.gguf'] = 'hello world';
        runner.contents['b.gguf'] = 'hello world';
        const config = makeConfig({ models: [a, b] });

        const summary = await orchestrator(config).run(all(config));

        expect(summary.results[0]).toMatchObject({
            status: 'failed',
            error: expect.objectContaining({
                code: DownloadErrorCode.CHECKSUM_MISMATCH,
                context: expect.objectContaining({ expected: '0'.repeat(64), actual: HELLO_SHA256 }),
            }),
        });
        expect(await store.exists(a.confirmationFile)).toBe(false);
        expect(await fs.readFile(a.location, 'utf-8')).toBe('hello world');
        expect(summary.results[1]).toEqual({ status: 'success', item: b });
    });

    it('aborts before any transfer when a prerequisite is missing', async () => {
        const a = makeModel(modelsDir, 'a');
        const image = makeOci(tempDir, 'quay.io/test/app');
        const config = makeConfig({ models: [a], oci: [image] });
        runner.available.delete('podman');
        const run = orchestrator(config);

        await expect(run.run(all(config))).rejects.toThrow(
            expect.objectContaining({ code: DownloadErrorCode.MISSING_PREREQUISITE_TOOL })
        );
        expect(runner.calls).toEqual([]);
        expect(await store.exists(a.confirmationFile)).toBe(false);
        expect(run.getState()).toEqual({ phase: 'selection-known', total: 2 });
    });

    it('reports a link conflict without failing the items', async () => {
        const a = makeModel(modelsDir, 'a');
        const config = makeConfig({ models: [a] });
        await fs.mkdir(modelsDir, { recursive: true });
        await fs.writeFile(path.join(modelsDir, 'default-model.gguf'), 'not a link');

        const summary = await orchestrator(config).run(all(config));

        expect(summary.results).toEqual([{ status: 'success', item: a }]);
        expect(summary.defaultModel).toBeUndefined();
        expect(summary.defaultLinkError?.code).toBe(DownloadErrorCode.DEFAULT_LINK_CONFLICT);
    });

    it('moves through its states and emits item events', async () => {
        const a = makeModel(modelsDir, 'a');
        const config = makeConfig({ models: [a] });
        const states: OrchestratorState[] = [];
        const onItemComplete = vi.fn();
        const run = orchestrator(config, {
            onItemStart: () => states.push(run.getState()),
            onItemComplete,
        });

        expect(run.getState()).toEqual({ phase: 'init' });
        const summary = await run.run([a]);

        expect(states).toEqual([{ phase: 'processing', index: 0, total: 1 }]);
        expect(onItemComplete).toHaveBeenCalledWith({ status: 'success', item: a }, 0, 1);
        expect(run.getState()).toEqual({ phase: 'done', summary });
    });
});
