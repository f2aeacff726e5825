/**
 * Vitest configuration for nexus-reconcile
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    exclude: ['**/node_modules/**', '**/dist/**'],

    // Enable globals for describe, it, expect
    globals: true,

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts', 'src/index.ts'],
    },

    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
