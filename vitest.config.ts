import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      TEST_LOG_FILE: 'false',
      TOOLSTREAM_LOG_LEVEL: 'error'
    }
  }
});
