import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: ['lib/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'production',
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '**/*.config.{js,ts}',
        '**/*.d.ts',
      ],
    },
  },
});
