import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['venmo/**/*.test.ts'],
    environment: 'node',
  },
});
