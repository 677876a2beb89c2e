import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@prism/shared': `${packagesDir}/shared`,
      '@prism/schemas': `${packagesDir}/schemas`,
      '@prism/core': `${packagesDir}/core`,
      '@prism/api': `${packagesDir}/api`,
    },
  },
});
