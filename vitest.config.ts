import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // transport suites open loopback sockets; keep them in child processes
    pool: 'forks',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
