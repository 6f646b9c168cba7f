import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      LOG_TO_FILE: 'false',
      HISTORY_ENABLED: 'false',
    },
  },
});
