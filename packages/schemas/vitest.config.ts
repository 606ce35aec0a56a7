import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: false,
    reporters: 'default',
    include: ['src/__tests__/**/*.test.ts'],
  },
});
