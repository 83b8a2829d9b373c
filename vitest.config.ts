import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['filters/**/*.test.ts'],
    environment: 'node',
  },
});
