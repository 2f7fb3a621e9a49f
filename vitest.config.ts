import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Root configuration: one project per workspace package, deterministic
 * property runs, and the fast-check run count from FC_NUM_RUNS.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool: 'forks',
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 60000 : 20000,
    hookTimeout: 10000,
    reporters: ['default'],
    projects: ['packages/*'],
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },
    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
