import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source.
 *
 * Workspace imports are aliased to their source entrypoints so tests never
 * depend on a build step. More specific subpaths come first.
 */
export default defineConfig({
  resolve: {
    alias: [
      { find: 'cta-audit/types', replacement: path.join(repoRoot, 'packages/core/src/types-entry.ts') },
      { find: /^cta-audit$/, replacement: path.join(repoRoot, 'packages/core/src/index.ts') },
      { find: '@cta-audit/rules', replacement: path.join(repoRoot, 'packages/rules/src/index.ts') },
      {
        find: '@cta-audit/ai-providers',
        replacement: path.join(repoRoot, 'packages/ai-providers/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/**/src/**/*.test.ts'],
  },
});
