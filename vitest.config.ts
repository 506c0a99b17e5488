import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['src/**/*.test.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'html'],
      reportsDirectory: './coverage',

      // Include all source files
      include: ['src/**/*.ts'],

      // Exclude test files and index re-exports
      exclude: [
        'src/**/*.test.ts',
        'src/**/index.ts',
        'src/cli.ts', // CLI is exercised through runBatch
      ],

      thresholds: {
        statements: 60,
        branches: 50,
        functions: 60,
        lines: 60,
      },
    },

    // Global test timeout
    testTimeout: 10000,

    // Environment
    environment: 'node',
  },
});
