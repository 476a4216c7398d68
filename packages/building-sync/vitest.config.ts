import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'building-sync',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        setupFiles: ['src/__tests__/setup.ts'],
        environment: 'node',
        testTimeout: 5_000,
        pool: 'forks',
        globals: true,
        // Unit tests must be deterministic
        retry: 0,
    },
});
