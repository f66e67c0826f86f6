import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    target: 'es2022',
  },
  test: {
    globals: true,

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        'benchmarks/**',
        'vitest.config.ts',
      ],
      include: ['src/**/*.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
  },
});
