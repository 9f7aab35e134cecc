import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'src/**/*.test.ts',
      'app/src/**/*.test.ts',
      'bots/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts', 'app/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: ['app/src/index.ts', '**/__tests__/**'],
    },
  },
});
