import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/frontend/ast.ts',
        'src/diagnostics/types.ts',
        'src/formats/types.ts',
        'src/semantics/typed.ts',
        'src/lowering/normalized.ts',
        'src/pipeline.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
