import { z } from 'zod';
import { CHECKSUM_ALGORITHMS, parseChecksum } from '../download/checksum.js';
import { isHttpReference } from '../download/http-transfer.js';
import { MODEL_PROVIDERS, OCI_PROVIDERS } from '../download/types.js';

const NonEmptyString = z.string().trim().min(1);

export const ModelItemSchema = z
    .object({
        repo_name: NonEmptyString.refine((value) => !isHttpReference(value) || URL.canParse(value), {
            message: 'repo_name starts with http(s):// but is not a valid URL',
        }).describe('Hub repository id or http(s) URL of the artifact'),
        model_name: NonEmptyString.describe('Artifact file name inside the repository'),
        location: NonEmptyString.describe('Where the artifact is stored'),
        confirmation_file: NonEmptyString.describe('Completion marker path'),
        checksum: z
            .string()
            .refine((value) => parseChecksum(value) !== null, {
                message: `Checksum must be '<algorithm>:<hex>' or bare sha256 hex; supported algorithms: ${CHECKSUM_ALGORITHMS.join(', ')}`,
            })
            .nullish()
            .describe('Expected digest of the artifact'),
    })
    .strict();

export const OciItemSchema = z
    .object({
        image: NonEmptyString.describe('Image reference, also the build tag'),
        confirmation_file: NonEmptyString.describe('Completion marker path'),
        containerfile: NonEmptyString.nullish().describe('Build from this file instead of pulling'),
        build_args: z
            .array(z.string())
            .nullish()
            .transform((args) => args ?? [])
            .describe('KEY=value pairs passed as --build-arg'),
    })
    .strict();

export const NeurobikConfigSchema = z
    .object({
        model_provider: z
            .enum(MODEL_PROVIDERS)
            .nullish()
            .transform((provider) => provider ?? 'llama.cpp'),
        oci_provider: z
            .enum(OCI_PROVIDERS)
            .nullish()
            .transform((provider) => provider ?? 'podman'),
        default_gguf: NonEmptyString.nullish().describe('Model file name preferred for the default link'),
        models: z
            .array(ModelItemSchema)
            .nullish()
            .transform((models) => models ?? []),
        oci: z
            .array(OciItemSchema)
            .nullish()
            .transform((oci) => oci ?? []),
    })
    .strict()
    .superRefine((config, ctx) => {
        if (config.default_gguf && config.models.length > 0) {
            const names = config.models.map((model) => model.model_name);
            if (!names.includes(config.default_gguf)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['default_gguf'],
                    message: `default_gguf '${config.default_gguf}' not found in configured models`,
                });
            }
        }
    });

export type NeurobikConfigInput = z.input<typeof NeurobikConfigSchema>;
export type ValidatedConfigFile = z.output<typeof NeurobikConfigSchema>;
