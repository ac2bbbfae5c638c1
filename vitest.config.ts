import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'production',
    },
    testTimeout: 10000,
  },
});
