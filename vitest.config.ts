import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'task/src/**/*.spec.ts', 'plugin/src/**/*.test.ts']
  }
});
