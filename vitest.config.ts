import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    plugins: [tsconfigPaths()],
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        // In-process Postgres boots per test file.
        testTimeout: 30_000,
        hookTimeout: 30_000,
    },
});
