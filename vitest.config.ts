import { defineConfig } from 'vitest/config';

// Coverage is global in Vitest, so `--project <name>` on the command line
// picks which layers count towards it.

const EXCLUDE = ['src/**/*.test.ts', 'src/**/*.d.ts', 'src/__tests__/**', 'src/index.ts']

const COVERAGE_INCLUDE: Record<string, string[]> = {
  unit: ['src/L0-pure/**/*.ts', 'src/L1-infra/**/*.ts', 'src/L2-clients/**/*.ts', 'src/L3-services/**/*.ts', 'src/L6-pipeline/**/*.ts', 'src/L7-app/**/*.ts'],
  'integration-L3': ['src/L1-infra/**/*.ts', 'src/L3-services/**/*.ts'],
}

function selectedProject(argv: string[]): string | undefined {
  const index = argv.indexOf('--project')
  return index >= 0 && argv.lastIndexOf('--project') === index ? argv[index + 1] : undefined
}

const project = selectedProject(process.argv)
const include = project ? COVERAGE_INCLUDE[project] : undefined

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: include ?? ['src/**/*.ts'],
      exclude: EXCLUDE,
      reportsDirectory: project ? `coverage/${project}` : 'coverage',
    },
    testTimeout: 30000,

    // ── Per-tier test projects ──
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
          name: 'integration-L3',
          include: ['src/__tests__/integration/L3/**/*.test.ts'],
        },
      },
    ],
  },
});
