import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
  },
});
