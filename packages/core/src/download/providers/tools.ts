import type { ModelProviderName, OciProviderName } from '../types.js';

export type ExternalTool = 'hf' | 'podman';

export interface ToolInfo {
    /** What the tool is used for, shown when it is missing */
    purpose: string;
    installHint: string;
}

export const TOOLS: Record<ExternalTool, ToolInfo> = {
    hf: {
        purpose: 'pulling models from the Hugging Face hub',
        installHint: 'Install the hf CLI with: pip install -U huggingface_hub',
    },
    podman: {
        purpose: 'pulling and building OCI images',
        installHint: 'Install podman: https://podman.io/docs/installation',
    },
};

/**
 * Tool that materializes hub-hosted GGUF files for each model provider.
 * Every provider consumes the artifact from its configured location, so all of
 * them fetch through the hub CLI into that location.
 */
export const MODEL_PULL_TOOL: Record<ModelProviderName, ExternalTool> = {
    ollama: 'hf',
    'llama.cpp': 'hf',
    ramalama: 'hf',
};

export const OCI_TOOL: Record<OciProviderName, ExternalTool> = {
    podman: 'podman',
};
