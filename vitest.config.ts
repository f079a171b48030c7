import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/spec/**/*.spec.ts'],
    environment: 'node',
  },
});
