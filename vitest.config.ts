import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pool = process.env.VITEST_POOL === 'threads' ? 'threads' : 'forks';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },
    include: ['packages/*/test/**/*.test.ts', 'agent/test/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool
  },
  resolve: {
    alias: {
      '@git-rollout/logger': fromRoot('./packages/logger/src/index.ts'),
      '@git-rollout/config': fromRoot('./packages/config/src/index.ts'),
      '@git-rollout/resilience': fromRoot('./packages/resilience/src/index.ts'),
      '@git-rollout/gitops': fromRoot('./packages/gitops/src/index.ts'),
      '@git-rollout/k8s-rollout': fromRoot('./packages/k8s-rollout/src/index.ts')
    }
  }
});
