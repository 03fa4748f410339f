import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts', 'packages/**/*.{test,spec}.ts'],
    testTimeout: 30000,
    // tree-sitter is a native addon; keep each test file in its own process
    pool: 'forks',
  },
  resolve: {
    alias: {
      '@scriptscope/introspector-core': fileURLToPath(new URL('./packages/introspector-core/src/index.ts', import.meta.url)),
      '@scriptscope/grammar-loader': fileURLToPath(new URL('./packages/grammar-loader/src/index.ts', import.meta.url)),
    },
  },
});
