import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/**',
        'src/infrastructure/config.ts',
        'src/infrastructure/db/errors.ts',
        'src/infrastructure/db/semaphore.ts',
        'src/infrastructure/db/pool.ts',
        'src/infrastructure/db/query-renderer.ts',
        'src/infrastructure/db/merge-statement.ts',
        'src/infrastructure/db/row-codec.ts',
        'src/infrastructure/db/migrate.ts',
        'src/infrastructure/db/entity-repository.ts',
        'src/infrastructure/db/curation-repository.ts',
        'src/infrastructure/db/document-query-repository.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
