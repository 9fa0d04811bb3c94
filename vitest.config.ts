import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources
      '@zpr/kernel': src('kernel'),
      '@zpr/wire': src('wire'),
      '@zpr/types': src('types'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
