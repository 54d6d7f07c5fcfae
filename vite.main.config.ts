import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

// https://vitejs.dev/config
export default defineConfig({
  build: {
    ssr: fileURLToPath(new URL('src/main/index.ts', import.meta.url)),
    outDir: 'dist',
    target: 'node20',
    sourcemap: true,
    minify: false, // Disable minification for better debugging
    rollupOptions: {
      output: {
        entryFileNames: 'index.js',
        banner: '#!/usr/bin/env node',
      },
    },
  },
  ssr: {
    // Dependencies are bundled into dist/index.js
    noExternal: true,
  },
  resolve: {
    alias: {
      '@sinelab/signal-api': fileURLToPath(new URL('packages/signal-api/src/index.ts', import.meta.url)),
    },
  },
});
