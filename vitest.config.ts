import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/unit/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/infrastructure/adapters/**/*.ts',
        'src/application/**/*.ts',
        'src/domain/**/*.ts',
        'src/cli/**/*.ts',
      ],
      exclude: ['**/index.ts', '**/*.module.ts'],
    },
    include: ['test/unit/**/*.spec.ts'],
    exclude: ['node_modules/', 'dist/'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
