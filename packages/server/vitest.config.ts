import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 30_000,
    hookTimeout: 30_000,
    clearMocks: true,
    globals: false,
    reporters: 'default',
    include: ['src/__tests__/**/*.test.ts'],
  },
});
