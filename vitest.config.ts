import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        // tree-sitter is a native addon; keep it out of worker threads
        pool: 'forks',
        testTimeout: 20_000,
    },
});
