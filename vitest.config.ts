import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'web'],

    // Environment
    environment: 'node',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],

      // Library code only; commands and the dashboard are exercised by hand
      include: ['src/lib/**/*.ts', 'src/utils/**/*.ts'],

      exclude: ['**/*.test.ts', '**/node_modules/**', '**/dist/**', '**/tests/**'],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
