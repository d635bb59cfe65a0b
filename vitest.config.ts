import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Trees are built from SMT_* env vars; keep test output quiet and deterministic
    env: {
      SMT_LOG_LEVEL: 'silent',
    },
  },
});
