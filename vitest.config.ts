import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the world model engine.
 *
 * Every test runs in process: SQLite stores live in per-test temp directories
 * and nothing reaches the network.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
        isolate: true,
      },
    },
  },
});
