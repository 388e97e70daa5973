import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@hiergraph/shared': packageEntry('shared'),
      '@hiergraph/config': packageEntry('config'),
      '@hiergraph/core': packageEntry('core'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
