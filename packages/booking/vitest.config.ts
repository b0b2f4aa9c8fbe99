import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'booking',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
