import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/server/src/**/*.test.ts'],
    setupFiles: ['./packages/server/src/__tests__/vitest.setup.ts'],
    globals: true,
  },
});
