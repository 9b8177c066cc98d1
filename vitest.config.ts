import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'core/**/*.test.ts', 'lib/**/*.test.ts'],
  },
})
