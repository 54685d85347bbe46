import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      STORE_DRIVER: 'memory',
      JWT_ACCESS_SECRET: 'test-access-secret-0123456789',
      JWT_PENDING_SECRET: 'test-pending-secret-0123456789',
      SMTP_FROM_EMAIL: 'no-reply@example.com',
      SMS_PROVIDER: 'log',
      BCRYPT_ROUNDS: '4',
    },
  },
});
