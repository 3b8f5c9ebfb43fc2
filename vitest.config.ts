import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['chat/**/*.test.ts', 'server/**/*.test.ts', 'cli/**/*.test.ts'],
    environment: 'node',
  },
});
