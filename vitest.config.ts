import { fileURLToPath } from 'node:url'
import { defineConfig, configDefaults } from 'vitest/config'

const packageEntry = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@modelforge/shared': packageEntry('shared'),
      '@modelforge/fields': packageEntry('fields'),
      '@modelforge/capabilities': packageEntry('capabilities'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, 'dist/**'],
    root: fileURLToPath(new URL('./', import.meta.url)),
    setupFiles: ['./tests/setup.ts'],
  },
})
