import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    resolve: {
        alias: {
            // Workspace packages resolve to their sources so tests need no build
            '@neurobik/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        watch: false,
    },
});
