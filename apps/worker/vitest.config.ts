import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/analytics/buckets.ts',
        'src/analytics/latency.ts',
        'src/history/store.ts',
        'src/monitor/target-list.ts',
        'src/monitor/targets.ts',
        'src/time/zone.ts',
      ],
    },
  },
});
