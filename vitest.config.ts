import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'ERROR',
    },
  },
});
