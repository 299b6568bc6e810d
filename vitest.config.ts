import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@logloom': fileURLToPath(new URL('./packages', import.meta.url)),
    },
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules'],
  },
});
