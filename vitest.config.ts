import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/*.test.ts', 'bucketferry/src/**/__tests__/*.test.ts'],
    testTimeout: 10000,
  },
});
