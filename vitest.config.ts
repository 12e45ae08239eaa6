import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/resilient-http-core': fileURLToPath(new URL('./libs/resilient-http-core/src/index.ts', import.meta.url)),
  '@libs/collection-client': fileURLToPath(new URL('./libs/collection-client/src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/**/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
