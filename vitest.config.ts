import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['services/**/__tests__/**/*.spec.ts']
  }
})
