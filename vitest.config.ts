import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/heuristics/index.ts',
        'src/metrics/index.ts',
        'src/reporting/index.ts',
        'src/serialization/index.ts',
      ],
    },
  },
});
