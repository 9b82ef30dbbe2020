import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration
 *
 * - Fork pool with isolation, so counters and the default generator never
 *   leak between files
 * - No retries, to surface issues immediately
 * - Extended timeouts for property-based testing
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    pool: 'forks',
    poolOptions: {
      forks: {
        isolate: true,
      },
    },

    setupFiles: ['./test/setup.ts'],

    include: ['packages/**/*.{test,spec}.ts', 'test/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/__tests__/**'],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
