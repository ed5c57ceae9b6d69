import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['engine/src/**/*.test.ts', 'agents/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000
  }
});
