import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/model-dispatch/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000
  }
});
