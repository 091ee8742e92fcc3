import { defineConfig } from 'vitest/config';

/**
 * Root Vitest Configuration
 *
 * Runs the unit (*.unit.test.ts) and integration (*.integration.test.ts)
 * suites of every workspace package in one pass.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'core/src/__tests__/**/*.test.ts',
      'config/src/__tests__/**/*.test.ts',
      'frame/src/__tests__/**/*.test.ts',
      'query/src/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
      ],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
