import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Test against workspace sources rather than the built package
      '@cross-poster/shared': fileURLToPath(new URL('../shared/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'tests/', '**/*.d.ts'],
    },
    testTimeout: 30000,
    onConsoleLog(log, type) {
      // Suppress expected progress and error-path output while keeping unexpected logs visible
      if (type === 'stderr') {
        const suppressPatterns = ['ℹ️', '⚠️', '❌', '✅'];
        if (suppressPatterns.some((p) => log.includes(p))) return false;
      }
      return true;
    },
  },
});
