import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared/schema': `${root}packages/shared/schema`,
      '@shared': `${root}packages/shared`,
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['server/**/*.test.ts', 'packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['server/**/*.ts', 'packages/shared/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/*.test.ts',
        '**/*.d.ts',
        // Pure interface/type-alias files compile to empty JS
        '**/types.ts',
        // Entry points, exercised through the route and engine tests
        'server/index.ts',
        'server/config/env.ts',
        'packages/shared/schema/commerce.ts',
        'server/__tests__/helpers/**',
      ],
    },
    testTimeout: 10000,
  },
});
