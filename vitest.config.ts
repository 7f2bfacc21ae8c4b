import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

function workspaceEntry(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources; subpath
    // entries come before the package root they extend.
    alias: [
      { find: '@sealdrop/crypto/testkit', replacement: workspaceEntry('./packages/crypto/src/testkit.ts') },
      { find: '@sealdrop/kernel', replacement: workspaceEntry('./packages/kernel/src/index.ts') },
      { find: '@sealdrop/crypto', replacement: workspaceEntry('./packages/crypto/src/index.ts') },
      { find: '@sealdrop/audit', replacement: workspaceEntry('./packages/audit/src/index.ts') },
      { find: '@sealdrop/ledger', replacement: workspaceEntry('./packages/ledger/src/index.ts') },
    ],
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/src/__tests__/**/*.test.ts'],
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
