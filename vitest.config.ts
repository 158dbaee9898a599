import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@forkline/core': pkg('core'),
      '@forkline/engine': pkg('engine'),
      '@forkline/adapters': pkg('adapters'),
      '@forkline/testing': pkg('testing'),
      '@forkline/training': pkg('training')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node'
  }
});
