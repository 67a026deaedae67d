import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    globals: false,
    restoreMocks: true,
    env: {
      LOG_STORE_PATH: fileURLToPath(new URL('./.data/test-logs', import.meta.url)),
    },
  },
  resolve: {
    alias: {
      '@quorum-governor/shared': fileURLToPath(new URL('../../packages/shared/src/index.ts', import.meta.url)),
    },
  },
});
