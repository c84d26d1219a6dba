import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolvePackage = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
      exclude: ['node_modules/', 'dist/', '**/__tests__/**', '**/*.config.*', '**/index.ts'],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@cardiorisk/types': resolvePackage('./packages/types/src/index.ts'),
      '@cardiorisk/core': resolvePackage('./packages/core/src/index.ts'),
      '@cardiorisk/domain': resolvePackage('./packages/domain/src/index.ts'),
    },
  },
});
