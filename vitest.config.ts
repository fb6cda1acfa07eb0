import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolve = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@resumekit/agents': resolve('./agents/src/index.ts'),
      '@resumekit/llm': resolve('./packages/llm/src/index.ts'),
      '@resumekit/schemas': resolve('./packages/schemas/src/index.ts'),
    },
  },
});
