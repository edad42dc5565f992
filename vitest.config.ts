import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@odlkit/core': source('core'),
      '@odlkit/cli': source('cli'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
  },
});
