import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for the fixture workspaces.
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : '/tmp';
process.env.TMPDIR = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest configuration for tierscan.
 *
 * Unit mode (default) never talks to an inference server; `*.live.test.ts`
 * files run only with TIERSCAN_TEST_MODE=live.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: (process.env.TIERSCAN_TEST_MODE ?? 'unit') === 'live'
      ? ['node_modules/**', 'dist/**']
      : ['node_modules/**', 'dist/**', '**/*.live.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
