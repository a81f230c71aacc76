import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: {
      HARNESS_LOG_FORMAT: 'hidden',
    },
  },
});
