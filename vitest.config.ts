import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['npm/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
