import { defineConfig } from 'vitest/config';

export default defineConfig({
  cacheDir: '.vite-cache',
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 60_000,
    hookTimeout: 60_000,
    bail: 0,
    globals: true,
    env: {
      INSIGHT_LOG_DIR: 'artifacts/logs',
    },
    // Logger and run-logger write files; keep workers from racing on them
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
  },
});
