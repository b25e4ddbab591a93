import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/infrastructure/events/**',
        'src/application/rating-aggregator.ts',
        'src/application/event-handlers.ts',
        'src/application/review-events.ts',
        'src/application/review-metrics.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
