import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 60_000,    // spawns tsx-backed stub processes
    hookTimeout: 30_000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,   // fixtures own real processes and ports
      },
    },
    include: ['__tests__/**/*.test.ts'],
  },
});
