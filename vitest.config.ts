import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/__tests__/*.test.ts',
      'apps/api/test/**/*.test.ts',
    ],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@circulation/domain': fromRoot('./packages/domain/src/index.ts'),
      '@circulation/contract': fromRoot('./packages/contract/src/index.ts'),
    },
  },
});
