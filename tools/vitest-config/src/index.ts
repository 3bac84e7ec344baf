import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest settings for every workspace. Per-suite overrides in
 * `options.test` are merged over the defaults.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;
  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      setupFiles: ['./vitest.setup.ts'],
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts', '**/types.ts', '**/cli.ts'],
      },
      ...test,
    },
  };
};
