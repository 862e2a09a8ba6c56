import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

const root = fileURLToPath(new URL('.', import.meta.url));

const COVERAGE_THRESHOLD = 0;

export default defineConfig({
    resolve: {
        alias: {
            '@simlab-sdk/core': resolve(root, 'sdk/core/src/index.ts'),
            '@simlab-sdk/lab-client': resolve(root, 'sdk/lab-client/src/index.ts'),
        },
    },
    test: {
        environment: 'node',
        globals: true,
        watch: false,
        include: ['sdk/*/tests/**/*.{test,spec}.ts'],
        coverage: {
            provider: 'v8',
            include: ['sdk/*/src/**'],
            reporter: ['text', 'html'],
            thresholds: {
                statements: COVERAGE_THRESHOLD,
                branches: COVERAGE_THRESHOLD,
                functions: COVERAGE_THRESHOLD,
                lines: COVERAGE_THRESHOLD,
            },
        },
    },
});
