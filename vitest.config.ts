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
    include: ['**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    isolate: true,
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@database': path.resolve(__dirname, 'packages/database'),
      '@domain': path.resolve(__dirname, 'domains'),
    },
  },
});
