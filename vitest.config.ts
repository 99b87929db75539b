import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Repository tests run against pg-mem, so no database is needed
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**'],
    testTimeout: 20000, // argon2 hashing
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/infra/http/server.ts'],
    },
  },
});
