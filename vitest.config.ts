import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 20000,
    env: {
      FORCE_COLOR: '0',
      NO_COLOR: '1'
    }
  }
})
