import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            // Workspace aliases so tests run against sources without a build
            '@pulseboard/core': fromRoot('./packages/core/src/index.ts'),
            '@pulseboard/reporting': fromRoot('./packages/reporting/src/index.ts'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
    },
});
