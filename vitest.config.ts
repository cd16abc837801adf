import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/__tests__/**/*.vitest.ts'],
    globals: true,
    environment: 'node',
  },
});
