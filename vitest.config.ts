import path from 'node:path';
import { defineConfig } from 'vitest/config';

const repoRoot = __dirname;
const alias = {
  '@libs/resilient-http-core': path.resolve(repoRoot, 'libs/resilient-http-core/src/index.ts'),
  '@libs/commodities-client': path.resolve(repoRoot, 'libs/commodities-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
