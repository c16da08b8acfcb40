import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@stem-tutor/shared': pkg('shared'),
      '@stem-tutor/session': pkg('session'),
      '@stem-tutor/providers': pkg('providers'),
      '@stem-tutor/classifier': pkg('classifier'),
      '@stem-tutor/orchestrator': pkg('orchestrator'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
