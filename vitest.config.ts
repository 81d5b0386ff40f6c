import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    // Every probe spawns a real process; keep files from competing for CPU.
    fileParallelism: false,
    testTimeout: 20000,
  },
});
