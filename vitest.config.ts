import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    environment: 'node',
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@careernav/agents': fromRoot('./agents/src'),
      '@careernav/core': fromRoot('./packages/core/src'),
      '@careernav/db': fromRoot('./packages/db/src'),
      '@careernav/llm': fromRoot('./packages/llm/src'),
      '@careernav/schemas': fromRoot('./packages/schemas/src'),
      '@/lib': fromRoot('./apps/web/lib'),
      '@/app': fromRoot('./apps/web/app'),
    },
  },
});
