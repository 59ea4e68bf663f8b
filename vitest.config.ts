import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['fireworks/src/**/*.test.ts'],
    environment: 'node',
  },
});
