import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/unit/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: [
        'src/processing/**/*.ts',
        'src/worker-pool/**/*.ts',
        'src/application/**/*.ts',
        'src/domain/**/*.ts',
        'src/infrastructure/**/*.ts',
        'src/config/**/*.ts',
        'src/shared/**/*.ts',
        'src/cli/**/*.ts',
      ],
      exclude: ['node_modules/', 'test/', 'dist/', '**/*.spec.ts', 'vitest.config.ts'],
    },
    include: ['test/unit/**/*.spec.ts'],
    exclude: ['node_modules/', 'dist/'],
    testTimeout: 15000,
    hookTimeout: 10000,
  },
});
