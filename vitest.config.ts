import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@las\/scaler\/(.*)$/, replacement: `${resolvePath('./apps/scaler/src')}/$1` },
      { find: /^@las\/config$/, replacement: resolvePath('./packages/config/src/index.ts') },
      { find: /^@las\/domain$/, replacement: resolvePath('./packages/domain/src/index.ts') },
    ],
  },
  test: {
    include: ['apps/*/src/**/__tests__/**/*.test.ts', 'packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
