import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'diary-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@diary/platform-core': packageSource('../../platform-core/src/index.ts'),
      '@diary/shared-contracts': packageSource('../../shared/contracts/src/index.ts'),
      '@diary/test-utils': packageSource('../../shared/test-utils/src/index.ts'),
    },
  },
});
