import { describe, it, expect } from 'vitest';
import { expandEnvVars } from './env.js';

describe('expandEnvVars', () => {
    const env = { HOME: '/home/tester', MODELS: 'models' };

    it('expands bare and braced references', () => {
        expect(expandEnvVars('$HOME/${MODELS}/qwen.gguf', env)).toBe('/home/tester/models/qwen.gguf');
    });

    it('leaves unset variables untouched', () => {
        expect(expandEnvVars('$UNSET_VAR/file', env)).toBe('$UNSET_VAR/file');
        expect(expandEnvVars('${UNSET_VAR}/file', env)).toBe('${UNSET_VAR}/file');
    });

    it('returns strings without references unchanged', () => {
        expect(expandEnvVars('/srv/models/a.gguf', env)).toBe('/srv/models/a.gguf');
    });
});
