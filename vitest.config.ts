import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Vitest configuration for the varimodel workspace.
 *
 * One run covers every package: model synthesis, serialization round-trips,
 * key mapping, translation, validation and the batch harness.
 */

// Windows uses threads, Unix-like systems use forks for isolation
const getPoolConfig = () => {
  const pool = process.platform === 'win32' ? 'threads' : 'forks';
  return {
    pool,
    poolOptions: {
      threads: { singleThread: false, isolate: true },
      forks: { isolate: true },
    },
  } as const;
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',

    ...getPoolConfig(),

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    // Property-based tests run a few hundred cases
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/__fixtures__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
