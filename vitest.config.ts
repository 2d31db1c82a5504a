import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/tests/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    env: {
      NODE_ENV: 'test'
    }
  }
});
