import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const root = fileURLToPath(new URL('.', import.meta.url));
const pkg = (name: string) => path.resolve(root, `packages/${name}/src/index.ts`);

export default defineConfig({
  test: {
    root,
    include: ['packages/*/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@strata/core': pkg('core'),
      '@strata/extract': pkg('extract'),
      '@strata/corpus': pkg('corpus'),
      '@strata/retrieval': pkg('retrieval'),
      '@strata/cli': pkg('cli'),
    },
  },
});
