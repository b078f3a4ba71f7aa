import { defineConfig } from 'vitest/config';

// Plain Node; tests inject their own terminal and clock.
export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts']
  }
});
