import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { env } from '../config/env.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { CSRF_COOKIE } from '../utils/constants.js';
import { readCookie } from './auth.js';

const SAFE_METHODS = ['GET', 'HEAD', 'OPTIONS'];

/**
 * Double-submit cookie: state-changing requests must echo the `csrfToken`
 * cookie in the X-CSRF-Token header.
 */
export const csrfProtection = (req: Request, _res: Response, next: NextFunction): void => {
  if (SAFE_METHODS.includes(req.method)) {
    next();
    return;
  }

  const cookieToken = readCookie(req, CSRF_COOKIE);
  const headerToken = req.get('x-csrf-token');

  if (!cookieToken || !headerToken) {
    next(AppError.forbidden('CSRF token missing', ErrorCode.FORBIDDEN));
    return;
  }

  if (
    cookieToken.length !== headerToken.length ||
    !crypto.timingSafeEqual(Buffer.from(cookieToken), Buffer.from(headerToken))
  ) {
    next(AppError.forbidden('CSRF token mismatch', ErrorCode.FORBIDDEN));
    return;
  }

  next();
};

export function generateCsrfToken(): string {
  return crypto.createHmac('sha256', env.CSRF_SECRET).update(crypto.randomBytes(32)).digest('hex');
}
