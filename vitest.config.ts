import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

// __dirname is not defined under "type": "module"
const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    // Async tests that deadlock must not hang the run
    testTimeout: 10000,
    isolate: true,
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@cache': path.resolve(__dirname, 'packages/cache'),
      '@security': path.resolve(__dirname, 'packages/security'),
      '@database': path.resolve(__dirname, 'packages/database'),
      '@domain': path.resolve(__dirname, 'domains'),
    },
  },
});
