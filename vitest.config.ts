import { availableParallelism } from 'node:os';
import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration
 *
 * Page generation and scoring are CPU-bound, so test files run in forked
 * workers capped at half the available cores. Override with
 * BABEL_TEST_WORKERS.
 */
export default defineConfig(() => {
  let maxWorkers = Math.max(1, Math.floor(availableParallelism() / 2));
  const envWorkers = parseInt(process.env.BABEL_TEST_WORKERS ?? '', 10);
  if (!isNaN(envWorkers) && envWorkers > 0) {
    maxWorkers = envWorkers;
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks' as const,
      poolOptions: {
        forks: {
          maxForks: maxWorkers,
          minForks: 1,
        },
      },
      coverage: {
        provider: 'v8' as const,
        reporter: ['text', 'json', 'html'],
        exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts'],
      },
    },
  };
});
