/**
 * Vitest configuration for all workspace packages.
 * Use forked processes to avoid worker-thread limitations in sandbox.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    watch: false,
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist']
  }
});
