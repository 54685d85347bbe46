import rateLimit from 'express-rate-limit';
import { ErrorCode } from '../utils/appError.js';

/**
 * Per-IP limiters. These sit in front of the per-user OTP resend limit,
 * which the auth service enforces on its own.
 * - Login: 5/min
 * - OTP verify and resend: 10/min
 * - API: 100/min
 */
function limiter(max: number, message: string) {
  return rateLimit({
    windowMs: 60 * 1000,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: { code: ErrorCode.RATE_LIMITED, message },
    },
  });
}

// Built per app so each instance (and each test) counts from zero
export function createRateLimiters() {
  return {
    authLimiter: limiter(5, 'Too many login attempts. Please try again in 1 minute.'),
    otpLimiter: limiter(10, 'Too many OTP requests. Please wait 1 minute.'),
    apiLimiter: limiter(100, 'Too many requests. Please slow down.'),
  };
}

export type RateLimiters = ReturnType<typeof createRateLimiters>;
