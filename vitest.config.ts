import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/healthcheck.ts', 'src/config/**'],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
