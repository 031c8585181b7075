import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources, so tests need no build.
const sourceOf = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@docuqueue/contracts': sourceOf('contracts'),
      '@docuqueue/shared-infrastructure': sourceOf('shared-infrastructure'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
