import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./tests/setupMinimal.ts'],

    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    testTimeout: 10000,

    include: ['engine/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
