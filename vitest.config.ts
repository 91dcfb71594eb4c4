import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for devenv
 *
 * Tests run in-process against temp directories; subprocesses and HTTP are
 * replaced by FakeRunner and stubbed fetch, so no external services are needed.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'src/test/**', 'vitest.config.ts'],
    },
  },
});
