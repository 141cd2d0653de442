import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'services/**/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts']
  },
  resolve: {
    alias: {
      '@storefront/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@storefront/common': fileURLToPath(new URL('./packages/common/src/index.ts', import.meta.url))
    }
  }
});
