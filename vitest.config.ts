import { defineConfig } from 'vitest/config';

export const globalConfig = defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts', 'packages/*/test/**/*.e2e-spec.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
});

export default globalConfig;
