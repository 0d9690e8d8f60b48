import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    // isolated-vm needs the startup snapshot disabled on Node 20
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--no-node-snapshot'],
      },
    },
    testTimeout: 20_000,
  },
});
