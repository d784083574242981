import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // Digest-backed specs (pbkdf2 at 10000 rounds, sha-crypt) run well past the 5s default on slow CI.
    testTimeout: 30_000,
  },
});
