import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core-types': pkg('core-types'),
      'interp-core': pkg('interp-core'),
      'curve-fit': pkg('curve-fit'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ]
  },
});
