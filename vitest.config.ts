import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@sinelab/signal-api': fileURLToPath(new URL('packages/signal-api/src/index.ts', import.meta.url)),
    },
  },
});
