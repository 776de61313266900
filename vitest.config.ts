/// <reference types="vitest/config" />
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'test/**/*.test.ts',
      'src/**/__tests__/**/*.test.ts',
      'src/**/*.test.ts'
    ],
    setupFiles: ['test/setup.ts'],
    env: {
      LOG_LEVEL: 'info',
      SCREEN_LOG_TIMEZONE: 'Europe/London'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts']
    }
  }
})
