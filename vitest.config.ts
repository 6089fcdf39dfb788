import { defineConfig } from 'vitest/config'

// Note: Vite shows a CJS deprecation warning but this is just informational.
// The project uses CommonJS modules which work fine for our CLI tool.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
})
