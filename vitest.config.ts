import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./packages/web/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/**/tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
  },
});
