import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['pastebin/typescript/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
