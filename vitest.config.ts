import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['audiobook-organizer/src/**/*.test.ts'],
    environment: 'node',
  },
});
