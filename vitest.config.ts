import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'src/**/*.test.ts', 'tests/**']
    },
    setupFiles: ['./vitest.setup.ts'],
    // CLI tests start a tsx process per case
    testTimeout: 30000
  }
});
