/**
 * Vitest configuration
 *
 * Usage:
 *   npm test            # Run the unit suite once
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: [{ find: '@', replacement: fromRoot('./src') }],
  },
});
