import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@navkit/nav-mesh/testing',
        replacement: resolve(root, 'packages/nav-mesh/src/testing/nav-file-writer.ts'),
      },
      { find: '@navkit/core', replacement: resolve(root, 'packages/core/src/index.ts') },
      { find: '@navkit/nav-mesh', replacement: resolve(root, 'packages/nav-mesh/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
    // CLI tests start a fresh tsx process per case
    testTimeout: 30_000,
  },
});
