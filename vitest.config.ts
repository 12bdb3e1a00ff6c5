import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    watch: false,
    setupFiles: ['test/setup.ts'],
    testTimeout: 10000,
  },
});
