/**
 * Vitest Configuration for unit and integration tests
 *
 * Usage:
 *   npm test
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const resolveDir = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Setup file shared by all tests
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@': resolveDir('./src'),
    },
  },
});
