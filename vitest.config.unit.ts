import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    setupFiles: ['./tests/setup/vitest.base.setup.ts'],
    include: ['src/**/*.unit.test.ts'],
  },
});
