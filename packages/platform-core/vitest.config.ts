import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
