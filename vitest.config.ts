import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function packageSource(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@listsync/shared': packageSource('./packages/shared/src/index.ts'),
      '@listsync/sync-core': packageSource('./packages/sync-core/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
