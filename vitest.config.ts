import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Use Node environment for the pipeline and its adapters
    environment: 'node',

    // Global test setup
    setupFiles: ['./tests/setup.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '**/*.test.ts',
        '**/__tests__/**',
        'vitest.config.ts',
        'src/index.ts', // Process entry point
        'src/adapters/browser/**', // Needs a real browser
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    // Test match patterns
    include: ['**/__tests__/**/*.test.ts', '**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Globals
    globals: true,

    // Test timeout
    testTimeout: 30000,

    // Mock reset
    clearMocks: true,
  },
});
