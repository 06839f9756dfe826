import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: ['**/test/fixtures/**', '**/node_modules/**'],
    env: {
      CIRCUIT_DEBUGGER_LOG_DIR: join(tmpdir(), 'circuit-debugger-test-logs'),
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
