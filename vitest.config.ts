import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@corroborate/agents': fromRoot('./agents/src/index.ts'),
      '@corroborate/core': fromRoot('./packages/core/src/index.ts'),
      '@corroborate/schemas': fromRoot('./packages/schemas/src/index.ts'),
      '@corroborate/cli': fromRoot('./apps/cli/src/index.ts'),
    },
  },
});
