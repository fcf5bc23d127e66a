import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'packages/*/node_modules'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.{ts,tsx}', 'bin/**/*.{ts,tsx}', 'packages/*/src/**/*.ts'],
      exclude: [
        'src/index.ts', // Re-exports only
        'packages/*/src/index.ts',
        'src/**/*.d.ts',
        '**/*.test.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
})
