import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      TUNNEL_INGRESS_LOG_LEVEL: 'warn',
    },
  },
});
