/**
 * Vitest Configuration
 *
 * Runs the tests of every workspace package from the root:
 * - packages/core/tests: @scopeconf/core
 * - packages/cli/tests: @scopeconf/cli
 *
 * @scopeconf/core is aliased to its sources so the CLI tests need no build.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@scopeconf/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
    },
  },
});
