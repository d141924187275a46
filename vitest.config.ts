import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent'
    },
    include: ['packages/*/tests/**/*.test.ts', 'workers/*/tests/**/*.test.ts']
  },
  resolve: {
    alias: {
      '@typed-jobs/test-utils/matchers': fromRoot('./packages/jobs-test-utils/src/matchers/index.ts'),
      '@typed-jobs/test-utils': fromRoot('./packages/jobs-test-utils/src/index.ts'),
      '@typed-jobs/job-runner': fromRoot('./workers/job-runner/src/index.ts'),
      '@typed-jobs/core': fromRoot('./packages/jobs-core/src/index.ts')
    }
  }
});
