import type { UserConfig } from 'vitest/config';

/**
 * Options for the shared Vitest configuration
 */
export interface SharedTestOptions {
  /**
   * Test file globs (default: `src/**\/*.{test,spec}.ts`)
   */
  include?: string[];

  /**
   * Source globs measured by coverage (default: `src/**\/*.ts`)
   */
  coverageInclude?: string[];
}

export const defineConfig = (options: SharedTestOptions = {}): UserConfig => {
  return {
    test: {
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: options.include ?? ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: options.coverageInclude ?? ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts', '**/types.ts'],
      },
    },
  };
};
