import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@pathview/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
