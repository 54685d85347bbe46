import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),
  API_PREFIX: z.string().default('/api/v1'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Storage
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().default(''),

  // JWT
  JWT_ACCESS_SECRET: z.string().min(16),
  JWT_PENDING_SECRET: z.string().min(16),
  JWT_ACCESS_EXPIRY_MINUTES: z.coerce.number().int().positive().default(24 * 60),

  // Cookies
  COOKIE_DOMAIN: z.string().optional(),
  COOKIE_SECURE: booleanFlag,
  COOKIE_SAMESITE: z.enum(['lax', 'strict', 'none']).default('lax'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Mail provider
  EMAIL_PROVIDER: z.enum(['smtp', 'sendgrid_api']).default('smtp'),
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().default(587),
  SMTP_USER: z.string().default(''),
  SMTP_PASS: z.string().default(''),
  SMTP_FROM_EMAIL: z.string().email(),
  SMTP_FROM_NAME: z.string().default('Account Security'),
  SENDGRID_API_KEY: z.string().default(''),

  // SMS provider
  SMS_PROVIDER: z.enum(['log', 'http']).default('log'),
  SMS_GATEWAY_URL: z.string().default(''),
  SMS_GATEWAY_TOKEN: z.string().default(''),

  // Credentials
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

  // OTP
  OTP_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  OTP_EXPIRY_MINUTES: z.coerce.number().int().positive().default(10),
  MAX_OTP_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RESEND_RATE_LIMIT: z.coerce.number().int().positive().default(3),
  RESEND_RATE_WINDOW_MINUTES: z.coerce.number().int().positive().default(60),
  OTP_SWEEP_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(0),

  // CSRF
  CSRF_SECRET: z.string().min(16).default('change-me-csrf-secret-32chars!!'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const envData = parsed.data;

if (envData.STORE_DRIVER === 'mongo' && !envData.MONGODB_URI) {
  console.error('MONGODB_URI is required when STORE_DRIVER=mongo');
  process.exit(1);
}

if (envData.NODE_ENV === 'production') {
  const prodConfigErrors: string[] = [];

  if (envData.CSRF_SECRET === 'change-me-csrf-secret-32chars!!') {
    prodConfigErrors.push('CSRF_SECRET must be overridden in production');
  }

  if (envData.STORE_DRIVER === 'memory') {
    prodConfigErrors.push('STORE_DRIVER=memory is not allowed in production');
  }

  if (!envData.COOKIE_SECURE) {
    prodConfigErrors.push('COOKIE_SECURE must be true in production');
  }

  if (!envData.COOKIE_DOMAIN || envData.COOKIE_DOMAIN === 'localhost') {
    prodConfigErrors.push('COOKIE_DOMAIN must be set to a real domain in production');
  }

  if (envData.EMAIL_PROVIDER === 'smtp') {
    if (!envData.SMTP_USER) {
      prodConfigErrors.push('SMTP_USER is required when EMAIL_PROVIDER=smtp');
    }

    if (!envData.SMTP_PASS) {
      prodConfigErrors.push('SMTP_PASS is required when EMAIL_PROVIDER=smtp');
    }
  }

  if (envData.EMAIL_PROVIDER === 'sendgrid_api' && !envData.SENDGRID_API_KEY) {
    prodConfigErrors.push('SENDGRID_API_KEY is required when EMAIL_PROVIDER=sendgrid_api');
  }

  if (envData.SMS_PROVIDER === 'log') {
    prodConfigErrors.push('SMS_PROVIDER=log would print codes to the log; use http in production');
  }

  if (envData.SMS_PROVIDER === 'http' && !envData.SMS_GATEWAY_URL) {
    prodConfigErrors.push('SMS_GATEWAY_URL is required when SMS_PROVIDER=http');
  }

  if (prodConfigErrors.length > 0) {
    console.error('Invalid production environment variables:');
    for (const message of prodConfigErrors) {
      console.error(`- ${message}`);
    }
    process.exit(1);
  }
}

export const env = envData;

/**
 * OTP policy handed to the services, so they never read `env` directly.
 */
export interface OtpConfig {
  length: number;
  expiryMinutes: number;
  maxAttempts: number;
  resendLimit: number;
  resendWindowMinutes: number;
}

export const otpConfig: OtpConfig = {
  length: env.OTP_LENGTH,
  expiryMinutes: env.OTP_EXPIRY_MINUTES,
  maxAttempts: env.MAX_OTP_ATTEMPTS,
  resendLimit: env.RESEND_RATE_LIMIT,
  resendWindowMinutes: env.RESEND_RATE_WINDOW_MINUTES,
};
