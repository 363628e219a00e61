import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.{test,spec}.ts'],
    env: { NODE_ENV: 'test' },
  },
});
