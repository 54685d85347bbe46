import { RequestHandler, Router } from 'express';
import { validate } from '../../middleware/validate.js';
import type { RateLimiters } from '../../middleware/rateLimiter.js';
import type { AuthController } from './auth.controller.js';
import { createVerifyOtpSchema, loginSchema, resendOtpSchema } from './auth.validation.js';

export function createAuthRoutes(
  controller: AuthController,
  {
    authenticate,
    limiters,
    otpLength,
  }: { authenticate: RequestHandler; limiters: RateLimiters; otpLength: number },
): Router {
  const router = Router();

  // Public routes
  router.post('/login', limiters.authLimiter, validate(loginSchema), controller.login);
  router.post(
    '/verify',
    limiters.otpLimiter,
    validate(createVerifyOtpSchema(otpLength)),
    controller.verify,
  );
  router.post('/resend', limiters.otpLimiter, validate(resendOtpSchema), controller.resend);

  // Protected routes
  router.post('/logout', authenticate, controller.logout);
  router.get('/me', authenticate, controller.me);

  return router;
}
