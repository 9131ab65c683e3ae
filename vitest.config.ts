import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: [
      'packages/**/src/**/*.spec.ts',
      'packages/**/src/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 20000,

    coverage: {
      provider: 'v8',
      all: true,
      reportsDirectory: './coverage',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        statements: 60,
        lines: 60,
        branches: 60,
        functions: 70,
      },
      exclude: [
        '**/dist/**',
        '**/__tests__/**',
        '**/*.spec.*',
        '**/*.test.*',
        'packages/cli/src/index.ts',
      ],
    },
  },
})
