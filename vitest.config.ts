import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      NOTIFIER_URL: 'http://notifier.test',
      NOTIFICATIONS_ENABLED: 'false',
    },
  },
})
