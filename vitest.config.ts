import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@alert-buckets/types': pkg('types'),
      '@alert-buckets/core': pkg('core'),
      '@alert-buckets/provider-redis': pkg('provider-redis'),
      '@alert-buckets/provider-mongo': pkg('provider-mongo'),
      '@alert-buckets/geocoder': pkg('geocoder'),
      '@alert-buckets/sdk': pkg('sdk'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
