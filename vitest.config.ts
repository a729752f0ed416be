import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'data-pipelines/src/**/*.test.ts'],
    environment: 'node'
  }
});
