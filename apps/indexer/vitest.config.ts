import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('../..', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tidemark/shared/schemas': `${root}packages/shared/src/schemas/index.ts`,
      '@tidemark/shared/constants': `${root}packages/shared/src/constants.ts`,
      '@tidemark/shared/types': `${root}packages/shared/src/types/index.ts`,
      '@tidemark/shared': `${root}packages/shared/src/index.ts`,
      '@tidemark/db/schema': `${root}packages/db/src/schema/index.ts`,
      '@tidemark/db': `${root}packages/db/src/index.ts`,
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
