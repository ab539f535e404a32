/**
 * Vitest Workspace Configuration
 *
 * Each package runs its tests as its own project with shared settings.
 *
 * Workspace Projects:
 * - core: @loft-lang/core (input stream, tokenizer, parser, errors)
 * - cli: @loft-lang/cli (loft-check command, formatters, config)
 *
 * Run one project:
 *   npx vitest --project=core
 *
 * Run all tests:
 *   npx vitest run
 */
import { defineWorkspace } from 'vitest/config';

const coreEntry = new URL('./packages/core/src/index.ts', import.meta.url)
  .pathname;

export default defineWorkspace([
  {
    resolve: {
      alias: {
        '@loft-lang/core': coreEntry,
      },
    },
    test: {
      name: 'core',
      globals: false,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  {
    resolve: {
      alias: {
        '@loft-lang/core': coreEntry,
      },
    },
    test: {
      name: 'cli',
      globals: false,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
