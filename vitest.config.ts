import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src';

export default defineConfig(
  defineBaseConfig({
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'tools/*/src/**/*.{test,spec}.ts',
    ],
    coverageInclude: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
  }),
);
