import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages export dist/ at run time; tests load the sources
    alias: {
      '@audioshelf/shared': fileURLToPath(
        new URL('./packages/shared/src/types/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        // Barrel re-export files — no logic to test
        'packages/*/src/**/index.ts',
        // Pure TypeScript type definitions — no runtime code
        'packages/*/src/**/types.ts',
        'packages/core/src/cli.ts',
      ],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
