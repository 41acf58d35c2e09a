import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['fleet/**/*.test.ts', 'fleet-runner/src/**/*.test.ts'],
    environment: 'node',
  },
});
