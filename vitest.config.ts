import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts', 'amplify/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/**/*.ts', 'amplify/functions/**/*.ts'],
      exclude: ['**/__tests__/**', 'packages/cli/bin/**', '**/resource.ts'],
    },
  },
});
