import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'buildshape-scaler',
    include: ['src/**/*.test.ts', 'bin/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
  },
});
