import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for the entity resolver
 *
 * Unit tests run against a deterministic embedding provider and in-memory or
 * temp-dir SQLite stores; nothing loads a real model or touches the network.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'src/test/**'],
    },
  },
});
