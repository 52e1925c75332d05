import type { NeurobikRuntimeError } from '../errors/NeurobikRuntimeError.js';

export const MODEL_PROVIDERS = ['ollama', 'llama.cpp', 'ramalama'] as const;
export type ModelProviderName = (typeof MODEL_PROVIDERS)[number];

export const OCI_PROVIDERS = ['podman'] as const;
export type OciProviderName = (typeof OCI_PROVIDERS)[number];

/**
 * A model artifact to materialize at `location`.
 * Paths are absolute once the config layer has expanded and resolved them.
 */
export interface ModelItem {
    readonly kind: 'model';
    /** Hub repository id (e.g. `unsloth/Qwen3-0.6B-GGUF`) or an http(s) URL */
    readonly repoName: string;
    /** Artifact file name inside the repository */
    readonly modelName: string;
    readonly location: string;
    readonly confirmationFile: string;
    /** `<algorithm>:<hex>` or bare sha256 hex */
    readonly checksum?: string | undefined;
}

/**
 * A container image to pull, or to build when `containerfile` is set.
 */
export interface OciItem {
    readonly kind: 'oci';
    readonly image: string;
    readonly confirmationFile: string;
    readonly containerfile?: string | undefined;
    /** `KEY=value` pairs, passed in this order */
    readonly buildArgs: readonly string[];
}

export type DownloadItem = ModelItem | OciItem;

export interface NeurobikConfig {
    readonly modelProvider: ModelProviderName;
    readonly ociProvider: OciProviderName;
    /** Model file name preferred for the default-model link */
    readonly defaultGguf?: string | undefined;
    readonly models: readonly ModelItem[];
    readonly oci: readonly OciItem[];
}

/**
 * Outcome of one item's processing. Kept in memory for the run summary only.
 */
export type TransferResult =
    | { readonly status: 'success'; readonly item: DownloadItem }
    | { readonly status: 'skipped'; readonly item: DownloadItem }
    | { readonly status: 'failed'; readonly item: DownloadItem; readonly error: NeurobikRuntimeError };

export type DefaultLinkOutcome =
    | {
          readonly status: 'linked' | 'unchanged';
          readonly linkPath: string;
          /** Relative link target as written */
          readonly target: string;
          /** Absolute path of the model the link resolves to */
          readonly modelPath: string;
      }
    | { readonly status: 'none' }
    | { readonly status: 'failed'; readonly error: NeurobikRuntimeError };

export interface RunSummary {
    readonly results: readonly TransferResult[];
    /** Present when at least one model succeeded this run and the link is in place */
    readonly defaultModel?: { readonly path: string; readonly linkPath: string } | undefined;
    readonly defaultLinkError?: NeurobikRuntimeError | undefined;
}

export type OrchestratorState =
    | { readonly phase: 'init' }
    | { readonly phase: 'selection-known'; readonly total: number }
    | { readonly phase: 'processing'; readonly index: number; readonly total: number }
    | { readonly phase: 'done'; readonly summary: RunSummary };

/**
 * Byte-level progress for direct HTTP transfers.
 */
export interface TransferProgress {
    readonly item: ModelItem;
    readonly bytesDownloaded: number;
    readonly totalBytes: number;
    readonly percentage: number;
    /** Bytes per second */
    readonly speed?: number;
}

export interface OrchestratorEvents {
    onItemStart?: (item: DownloadItem, index: number, total: number) => void;
    onItemComplete?: (result: TransferResult, index: number, total: number) => void;
    onProgress?: (progress: TransferProgress) => void;
}
