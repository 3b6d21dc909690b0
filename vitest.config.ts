import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@rentmatch/shared': fromRoot('./src/backend/shared/src/index.ts'),
      '@rentmatch/filter-engine': fromRoot('./src/backend/filter-engine/src/index.ts'),
      '@rentmatch/listings-client': fromRoot('./src/backend/listings-client/src/index.ts'),
    },
  },
});
