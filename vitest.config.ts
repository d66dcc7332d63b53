import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // tree-sitter loads a native addon; keep each test file in its own forked
    // process rather than sharing it across worker threads.
    pool: 'forks',
    fileParallelism: false,
  },
});
