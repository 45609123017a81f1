import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      CONVERGENT_LOG_LEVEL: 'warn',
    },
  },
});
