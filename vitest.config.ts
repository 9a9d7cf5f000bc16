import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      MRI_QA_LOG_LEVEL: 'silent',
    },
  },
});
