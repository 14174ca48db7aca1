import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Set NODE_ENV for test detection (silences the logger)
    env: {
      NODE_ENV: 'test',
    },

    // Test file patterns
    include: ['packages/*/test/**/*.test.ts'],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/coverage/**',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/**/src/**/*.d.ts',
        'packages/http-server/src/main.ts',
      ],
    },

    // Global APIs like describe, it, expect
    globals: true,

    testTimeout: 10000,
    retry: 0,
    reporters: ['default'],
  },
});
