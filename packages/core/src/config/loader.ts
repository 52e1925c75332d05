import { promises as fs } from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ensureOk } from '../errors/result-bridge.js';
import { ErrorScope, ErrorType, type Issue } from '../errors/types.js';
import type { Logger } from '../logger/types.js';
import type { ModelItem, NeurobikConfig, OciItem } from '../download/types.js';
import { expandEnvVars } from '../utils/env.js';
import { fail, ok, zodToIssues, type Result } from '../utils/result.js';
import { ConfigErrorCode } from './error-codes.js';
import { ConfigError } from './errors.js';
import { NeurobikConfigSchema } from './schemas.js';

/**
 * Expand environment references, then anchor relative paths at the config directory.
 */
function resolvePath(value: string, baseDir: string, env: NodeJS.ProcessEnv): string {
    return path.resolve(baseDir, expandEnvVars(value, env));
}

function duplicateMarkerIssues(config: NeurobikConfig): Issue[] {
    const issues: Issue[] = [];
    const owners = new Map<string, string>();
    const entries: Array<{ marker: string; path: Array<string | number> }> = [
        ...config.models.map((m, i) => ({ marker: m.confirmationFile, path: ['models', i] })),
        ...config.oci.map((o, i) => ({ marker: o.confirmationFile, path: ['oci', i] })),
    ];

    for (const entry of entries) {
        const owner = owners.get(entry.marker);
        if (owner === undefined) {
            owners.set(entry.marker, entry.path.join('.'));
            continue;
        }
        issues.push({
            code: ConfigErrorCode.VALIDATION_ERROR,
            message: `confirmation_file '${entry.marker}' is already used by ${owner}`,
            path: [...entry.path, 'confirmation_file'],
            severity: 'error',
            scope: ErrorScope.CONFIG,
            type: ErrorType.USER,
        });
    }
    return issues;
}

/**
 * Validate a parsed config document and resolve its paths.
 *
 * @param raw - Parsed YAML (`null` for an empty file)
 * @param baseDir - Directory relative paths are resolved against
 */
export function validateConfig(
    raw: unknown,
    baseDir: string,
    env: NodeJS.ProcessEnv = process.env
): Result<NeurobikConfig> {
    const parsed = NeurobikConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        return fail(
            zodToIssues(parsed.error).map((issue) => ({
                ...issue,
                code: ConfigErrorCode.VALIDATION_ERROR,
            }))
        );
    }

    const data = parsed.data;
    const models: ModelItem[] = data.models.map((model) => ({
        kind: 'model',
        repoName: model.repo_name,
        modelName: model.model_name,
        location: resolvePath(model.location, baseDir, env),
        confirmationFile: resolvePath(model.confirmation_file, baseDir, env),
        ...(model.checksum != null && { checksum: model.checksum }),
    }));
    const oci: OciItem[] = data.oci.map((item) => ({
        kind: 'oci',
        image: item.image,
        confirmationFile: resolvePath(item.confirmation_file, baseDir, env),
        ...(item.containerfile != null && {
            containerfile: resolvePath(item.containerfile, baseDir, env),
        }),
        buildArgs: item.build_args,
    }));

    const config: NeurobikConfig = {
        modelProvider: data.model_provider,
        ociProvider: data.oci_provider,
        ...(data.default_gguf != null && { defaultGguf: data.default_gguf }),
        models,
        oci,
    };

    const issues = duplicateMarkerIssues(config);
    return issues.length > 0 ? fail(issues) : ok(config);
}

/**
 * Load, parse and validate a neurobik YAML configuration file.
 *
 * @throws {NeurobikRuntimeError} FILE_NOT_FOUND when the file does not exist
 * @throws {NeurobikRuntimeError} FILE_READ_ERROR when the file cannot be read
 * @throws {NeurobikRuntimeError} PARSE_ERROR when the content is not valid YAML
 * @throws {NeurobikValidationError} when the document does not describe a valid config
 */
export async function loadConfig(configPath: string, logger?: Logger): Promise<NeurobikConfig> {
    const absolutePath = path.resolve(configPath);

    try {
        await fs.access(absolutePath);
    } catch (_error) {
        throw ConfigError.fileNotFound(absolutePath);
    }

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw ConfigError.fileReadError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    let raw: unknown;
    try {
        raw = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(
            absolutePath,
            error instanceof Error ? error.message : String(error)
        );
    }

    const config = ensureOk(validateConfig(raw, path.dirname(absolutePath)), logger);
    logger?.debug(
        `Loaded ${config.models.length} model(s) and ${config.oci.length} image(s) from ${absolutePath}`
    );
    return config;
}
