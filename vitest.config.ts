import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts'],
    // The blocking transport tests spawn worker threads through tsx.
    testTimeout: 15_000,
    hookTimeout: 15_000,
    coverage: {
      exclude: ['examples/**', '**/types.ts', '**/index.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
