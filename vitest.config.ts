import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['__tests__/**/*.{test,spec}.ts', 'services/**/*.{test,spec}.ts', 'cli/**/*.{test,spec}.ts'],
    testTimeout: 10000,
  },
});
