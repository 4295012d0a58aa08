import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sync/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    environment: 'node',
  },
});
