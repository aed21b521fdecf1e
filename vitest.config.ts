import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'property-etl',
    include: ['tests/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});
