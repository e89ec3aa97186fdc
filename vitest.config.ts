import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(root, './src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    env: { LOG_LEVEL: 'silent' },
    include: ['src/**/*.spec.ts', 'src/**/*.test.ts'],
  },
})
