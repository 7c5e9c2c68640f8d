import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['validate-migration/src/**/*.test.ts'],
    environment: 'node'
  }
});
