/**
 * Vitest Configuration
 *
 * One project per workspace package. Both resolve `brewport` to the core
 * sources so tests never need a build first.
 *
 * Run a single project:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const coreEntry = fileURLToPath(
  new URL('./packages/core/src/index.ts', import.meta.url)
);

export default defineConfig({
  resolve: {
    alias: {
      brewport: coreEntry,
    },
  },
  test: {
    projects: [
      {
        resolve: { alias: { brewport: coreEntry } },
        test: {
          name: 'core',
          environment: 'node',
          include: ['packages/core/tests/**/*.test.ts'],
        },
      },
      {
        resolve: { alias: { brewport: coreEntry } },
        test: {
          name: 'cli',
          environment: 'node',
          include: ['packages/cli/tests/**/*.test.ts'],
        },
      },
    ],
  },
});
