import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { ZodError } from 'zod';
import type { ProfileRecord } from '../repositories/types.js';
import type { AuthService } from '../modules/auth/auth.service.js';
import type { ProfileService } from '../modules/profile/profile.service.js';
import type { TokenService } from '../modules/auth/tokens.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { ACCESS_TOKEN_COOKIE } from '../utils/constants.js';

// Extend Express Request
declare global {
  namespace Express {
    interface Request {
      userId?: string;
      sessionKey?: string;
      profile?: ProfileRecord;
    }
  }
}

export function readCookie(req: Request, name: string): string | undefined {
  const value: unknown = req.cookies?.[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readAccessToken(req: Request): string | undefined {
  const fromCookie = readCookie(req, ACCESS_TOKEN_COOKIE);
  if (fromCookie) return fromCookie;

  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim() || undefined;
  }
  return undefined;
}

function toTokenError(error: unknown): unknown {
  if (error instanceof jwt.TokenExpiredError) {
    return AppError.unauthorized('Access token expired', ErrorCode.TOKEN_EXPIRED);
  }
  if (error instanceof jwt.JsonWebTokenError || error instanceof ZodError) {
    return AppError.unauthorized('Invalid access token', ErrorCode.TOKEN_INVALID);
  }
  return error;
}

/**
 * The authenticated caller, as set by `authenticate`.
 */
export function currentAuth(req: Request): { userId: string; sessionKey: string } {
  if (!req.userId || !req.sessionKey) {
    throw AppError.unauthorized('Access token required', ErrorCode.TOKEN_INVALID);
  }
  return { userId: req.userId, sessionKey: req.sessionKey };
}

/**
 * Authenticate via access token (httpOnly cookie or Authorization header).
 * The token's session must still be active; logging out kills it at once.
 */
export function createAuthenticate({ tokens, auth }: { tokens: TokenService; auth: AuthService }) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = readAccessToken(req);
      if (!token) {
        throw AppError.unauthorized('Access token required', ErrorCode.TOKEN_INVALID);
      }

      const claims = tokens.verifyAccess(token);

      const session = await auth.resolveSession(claims.sid);
      if (!session || session.userId !== claims.userId) {
        throw AppError.unauthorized('Session is no longer active', ErrorCode.SESSION_INACTIVE);
      }

      req.userId = claims.userId;
      req.sessionKey = claims.sid;
      next();
    } catch (error) {
      next(toTokenError(error));
    }
  };
}

/**
 * Soft gate: only the routes that need a completed profile use it.
 */
export function createRequireProfile(profiles: ProfileService) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const { userId } = currentAuth(req);
      req.profile = await profiles.getProfile(userId);
      next();
    } catch (error) {
      next(error);
    }
  };
}
