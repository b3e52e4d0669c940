import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/__tests__/**', '**/index.ts', '**/*.config.*', 'apps/api/src/index.ts'],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@dentalcore/core': root('./packages/core/src/index.ts'),
      '@dentalcore/types': root('./packages/types/src/index.ts'),
      '@dentalcore/domain': root('./packages/domain/src/index.ts'),
      '@dentalcore/infrastructure': root('./packages/infrastructure/src/index.ts'),
    },
  },
});
