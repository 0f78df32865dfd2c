import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.spec.ts', 'src/**/__tests__/**/*.spec.ts'],
    exclude: ['node_modules', 'dist', 'src/**/__tests__/helpers.ts'],
  },
});
