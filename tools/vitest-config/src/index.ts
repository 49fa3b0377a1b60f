import type { UserConfig } from 'vitest/config';

/**
 * Base Vitest configuration shared by every workspace package.
 *
 * Package configs pass overrides; `test` options are merged one level deep.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: [
          '**/index.ts',
          '**/types.ts',
          '**/*.test.ts',
          'src/testing/**',
        ],
      },
      ...options.test,
    },
  };
};
