import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // *.int.test.ts need PostgreSQL and run under vitest.integration.config.ts
    include: ['src/**/*.test.ts'],
    exclude: ['src/**/*.int.test.ts', 'node_modules/**', 'dist/**'],
    restoreMocks: true,
    // Password hashing is real argon2
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/main.ts', 'src/scripts/**'],
      reporter: ['text', 'html'],
    },
  },
});
