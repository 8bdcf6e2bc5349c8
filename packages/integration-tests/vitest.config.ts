import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 60000, // 60 seconds for cluster scenarios
    hookTimeout: 30000, // 30 seconds for setup/teardown
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // Run tests sequentially so clusters never compete for ports
      },
    },
    globals: true,
  },
});
