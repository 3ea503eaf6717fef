import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['src/test-utils/setup.ts'],
    // tfjs model tests run on the pure-JS backend
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
