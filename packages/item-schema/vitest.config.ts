import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'item-schema',
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
