import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveDir = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@ces\/config$/, replacement: resolveDir('./packages/config/src/index.ts') },
      { find: /^@ces\/config\/(.*)$/, replacement: `${resolveDir('./packages/config/src')}/$1` },
      { find: /^@ces\/domain$/, replacement: resolveDir('./packages/domain/src/index.ts') },
      { find: /^@ces\/domain\/(.*)$/, replacement: `${resolveDir('./packages/domain/src')}/$1` },
      { find: /^@ces\/scanner\/(.*)$/, replacement: `${resolveDir('./apps/scanner/src')}/$1` },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
