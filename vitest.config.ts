import { defineConfig } from 'vitest/config';

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

// Re-export barrels carry no logic
const BARRELS = [
  'src/index.ts',
  'src/L2-clients/ffprobe/index.ts',
]

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [...BASE_EXCLUDE, ...BARRELS],
      reportsDirectory: 'coverage',
      thresholds: { statements: 80, branches: 75, functions: 80, lines: 80 },
    },
    testTimeout: 30000,

    // ── Per-tier test projects (setupFiles inherited via extends) ──
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          testTimeout: 10_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration',
          include: ['src/__tests__/integration/**/*.test.ts'],
          testTimeout: 30_000,
        },
      },
    ],
  },
});
