import { defineConfig } from 'vitest/config';

/**
 * Unit tests run against fakes behind the provider and index interfaces,
 * SQLite `:memory:` databases and temp directories.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
