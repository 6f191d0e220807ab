/**
 * Vitest Configuration
 *
 * Tests live under packages/core/tests and load the package sources
 * directly, so no build is needed first.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['packages/core/tests/**/*.test.ts'],
  },
});
