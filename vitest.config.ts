import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false, // We are importing globals explicitly
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
        testTimeout: 30000,
    },
});
