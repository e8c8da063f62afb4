import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': fileURLToPath(new URL('./src/shared', import.meta.url)),
      '@core': fileURLToPath(new URL('./src/core', import.meta.url)),
    },
  },
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      include: ['src/**/*.ts'],
      exclude: [
        'src/bin.ts',
        'src/shared/testing',
        'src/shared/index.ts',
        'src/shared/*/index.ts',
        'src/core/**/index.ts',
        'src/shared/types/*.ts',
      ],
    },
  },
});
