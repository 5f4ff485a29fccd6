import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@kernelkit/core': source('./packages/core/src/index.ts'),
      '@kernelkit/adapters': source('./packages/adapters/src/index.ts'),
      '@kernelkit/runtime': source('./packages/runtime/src/index.ts'),
      '@kernelkit/testing': source('./packages/testing/src/index.ts'),
      kernelkit: source('./packages/kernelkit/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'examples/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000
  }
});
