import { defineConfig } from 'vitest/config';

// Needs DATABASE_URL; suites skip themselves without it
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    // Suites share one database, so files run one at a time
    pool: 'forks',
    fileParallelism: false,
    testTimeout: 30000,
  },
});
