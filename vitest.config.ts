import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['nbt/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
  },
});
