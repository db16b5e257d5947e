import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Tests drive real git processes, including full history rewrites
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
