import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    name: 'all',
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/tests/unit/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 10000, // 10 seconds max per unit test
    hookTimeout: 5000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/tests/**', '**/*.test.ts'],
    },
    pool: 'forks',
  },
  resolve: {
    alias: {
      '@huffkit/shared': fromRoot('./packages/shared/src/index.ts'),
      '@huffkit/core': fromRoot('./packages/core/src/index.ts'),
    },
  },
});
