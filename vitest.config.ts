import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['tests/setup.ts'],
    // Single worker: timing assertions and module-level metrics/audit state don't tolerate parallel files
    pool: 'threads',
    poolOptions: {
      threads: {
        minThreads: 1,
        maxThreads: 1
      }
    },
    include: ['tests/**/*.test.ts']
  }
});
