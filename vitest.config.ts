import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', '**/dist', '**/*.integration.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
