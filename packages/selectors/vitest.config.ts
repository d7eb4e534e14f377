import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@fieldwise/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'selectors',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
