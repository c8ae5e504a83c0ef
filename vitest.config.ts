import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
    globals: true,
  },
});
