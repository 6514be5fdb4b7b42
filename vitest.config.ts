import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@simple-tools/credentials': fileURLToPath(new URL('./packages/credentials/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node',
        restoreMocks: true,
    },
});
