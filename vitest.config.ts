import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./test/setup.ts'],
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
      LOGGER_LEVEL: 'error',
    },
  },
});
