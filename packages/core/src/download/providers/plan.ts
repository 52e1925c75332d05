/**
 * Transfer plans: the closed set of ways one item can be materialized.
 * Planning is pure; executing a plan is the adapter's job.
 */

import * as path from 'path';
import { isHttpReference, resolveArtifactUrl } from '../http-transfer.js';
import type { DownloadItem, ModelItem, NeurobikConfig, OciItem } from '../types.js';
import { MODEL_PULL_TOOL, OCI_TOOL, type ExternalTool } from './tools.js';

export type TransferPlan =
    | {
          readonly kind: 'hub-cli';
          readonly item: ModelItem;
          readonly tool: ExternalTool;
          readonly args: readonly string[];
          /** Where the tool leaves the file before it is moved to `item.location` */
          readonly downloadedPath: string;
      }
    | { readonly kind: 'http'; readonly item: ModelItem; readonly url: string }
    | {
          readonly kind: 'oci-pull';
          readonly item: OciItem;
          readonly tool: ExternalTool;
          readonly args: readonly string[];
      }
    | {
          readonly kind: 'oci-build';
          readonly item: OciItem;
          readonly tool: ExternalTool;
          readonly args: readonly string[];
      };

export function planModelTransfer(item: ModelItem, config: Pick<NeurobikConfig, 'modelProvider'>): TransferPlan {
    if (isHttpReference(item.repoName)) {
        return { kind: 'http', item, url: resolveArtifactUrl(item.repoName, item.modelName) };
    }

    const localDir = path.dirname(item.location);
    return {
        kind: 'hub-cli',
        item,
        tool: MODEL_PULL_TOOL[config.modelProvider],
        args: ['download', item.repoName, item.modelName, '--local-dir', localDir],
        downloadedPath: path.join(localDir, item.modelName),
    };
}

export function planOciTransfer(item: OciItem, config: Pick<NeurobikConfig, 'ociProvider'>): TransferPlan {
    const tool = OCI_TOOL[config.ociProvider];

    if (!item.containerfile) {
        return { kind: 'oci-pull', item, tool, args: ['pull', item.image] };
    }

    const args = ['build', '-t', item.image];
    for (const buildArg of item.buildArgs) {
        args.push('--build-arg', buildArg);
    }
    args.push('-f', item.containerfile, path.dirname(item.containerfile));
    return { kind: 'oci-build', item, tool, args };
}

export function planTransfer(item: DownloadItem, config: NeurobikConfig): TransferPlan {
    return item.kind === 'model' ? planModelTransfer(item, config) : planOciTransfer(item, config);
}

/**
 * External tools the given plans need, in first-use order.
 */
export function requiredTools(plans: readonly TransferPlan[]): ExternalTool[] {
    const tools: ExternalTool[] = [];
    for (const plan of plans) {
        if (plan.kind !== 'http' && !tools.includes(plan.tool)) {
            tools.push(plan.tool);
        }
    }
    return tools;
}
