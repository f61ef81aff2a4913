import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const REPO_ROOT = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@devstrap\/core$/,
        replacement: path.join(REPO_ROOT, 'packages/@devstrap/core/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/@devstrap/*/__tests__/**/*.test.ts',
      'packages/@devstrap/*/src/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
