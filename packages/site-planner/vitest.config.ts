import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'site-planner',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    setupFiles: ['./src/__tests__/setup.ts'],
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
  },
});
