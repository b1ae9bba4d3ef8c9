import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    watch: false,
    silent: true,
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/test-utils/**',
        '**/*.test.ts',
        'src/cli.ts',
      ],
      thresholds: {
        branches: 90,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 10000,
    setupFiles: ['./src/test-utils/setup.ts'],
    server: {
      deps: {
        // Inline commander so vi.resetModules() also resets its global `program`
        inline: ['commander'],
      },
    },
  },
})
