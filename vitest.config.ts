import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@inkwell/domain': pkg('./packages/domain/src/index.ts'),
      '@inkwell/shared': pkg('./packages/shared/src/index.ts'),
      '@inkwell/db': pkg('./packages/db/src/index.ts'),
      '@inkwell/proto': pkg('./packages/proto/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
