import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@switchboard/core/testing': fromRoot('./packages/core/src/testing/fake-sql-client.ts'),
      '@switchboard/core': fromRoot('./packages/core/src/index.ts'),
      '@switchboard/router': fromRoot('./packages/router/src/index.ts'),
    },
  },
});
