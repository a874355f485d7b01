import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 30000,
    hookTimeout: 30000,

    // Each suite boots its own in-process PGlite database, so files can run
    // in parallel without sharing state.
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    // setup-api.ts provides the JWT secret used to mint test tokens
    setupFiles: ['./tests/setup-api.ts'],
  },
});
