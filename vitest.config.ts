import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'procurement-pipeline',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
  },
});
