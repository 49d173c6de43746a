// Vite config for the marketing site bundle.
// The site markup is rendered elsewhere; this bundle only ships the page script and its stylesheet.

import { defineConfig } from 'vite';
import checker from 'vite-plugin-checker';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  plugins: [
    checker({ typescript: { tsconfigPath: '../tsconfig.json' } }) // TypeScript type checking overlay
  ],
  server: {
    port: Number(process.env.VITE_PORT) || 5173,
    open: true
  },
  build: {
    outDir: '../dist',
    emptyOutDir: true,
    sourcemap: true,
    rollupOptions: {
      output: {
        entryFileNames: 'assets/[name].[hash].js',
        chunkFileNames: 'assets/[name].[hash].js',
        assetFileNames: 'assets/[name].[hash].[ext]',
        manualChunks: {
          // State management and utilities
          'state-vendor': ['zustand', 'lodash', 'luxon']
        }
      }
    }
  }
});
