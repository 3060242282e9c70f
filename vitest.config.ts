import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    // Quiet, deterministic log output for assertions on console calls
    env: {
      ASTROMECH_LOG_LEVEL: 'error',
      ASTROMECH_LOG_TIMESTAMPS: 'false'
    },
    // ALWAYS run once and exit, never watch
    watch: false,
    restoreMocks: true
  }
});
