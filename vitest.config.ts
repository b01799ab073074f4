import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/**/__tests__/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    // Tests open loopback sockets against the in-process simulator
    testTimeout: 10000,
  },
});
