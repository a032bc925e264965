import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['unicode-normalize/src/**/*.test.ts'],
    environment: 'node'
  }
});
