import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      DRIVEBRIDGE_LOG_LEVEL: 'silent',
    },
    pool: 'forks',
    maxConcurrency: 5,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
