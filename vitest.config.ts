import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points and type-only files
        'src/index.ts',
        'src/start-server.ts',
        'src/core/index.ts',
        'src/config/index.ts',
        'src/core/types.ts',
        'src/testing/**',
      ],
    },
  },
});
