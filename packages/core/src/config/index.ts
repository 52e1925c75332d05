export { loadConfig, validateConfig } from './loader.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
export {
    NeurobikConfigSchema,
    ModelItemSchema,
    OciItemSchema,
    type NeurobikConfigInput,
    type ValidatedConfigFile,
} from './schemas.js';
