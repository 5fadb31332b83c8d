/**
 * Vitest configuration for netsync
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    exclude: ['**/node_modules/**', '**/dist/**'],

    // Keep log noise out of test output unless explicitly requested
    env: {
      NETSYNC_LOG_LEVEL: process.env.NETSYNC_LOG_LEVEL ?? 'error',
    },

    testTimeout: 10000,

    // Enable globals for describe, it, expect
    globals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    environment: 'node',
  },
});
