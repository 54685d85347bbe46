import { Request, Response, CookieOptions } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { env } from '../../config/env.js';
import { generateCsrfToken } from '../../middleware/csrf.js';
import { currentAuth, readCookie } from '../../middleware/auth.js';
import { AppError } from '../../utils/appError.js';
import { ACCESS_TOKEN_COOKIE, CSRF_COOKIE, PENDING_LOGIN_COOKIE } from '../../utils/constants.js';
import type { AuthService } from './auth.service.js';
import type { TokenService } from './tokens.js';
import type { LoginInput, ResendOtpInput, VerifyOtpInput } from './auth.validation.js';

export const COOKIE_OPTIONS: CookieOptions = {
  httpOnly: true,
  secure: env.COOKIE_SECURE,
  sameSite: env.COOKIE_SAMESITE,
  domain: env.COOKIE_DOMAIN,
  path: '/',
};

export const CSRF_COOKIE_OPTIONS: CookieOptions = {
  ...COOKIE_OPTIONS,
  httpOnly: false,
};

export function issueCsrfCookie(res: Response): string {
  const csrfToken = generateCsrfToken();
  res.cookie(CSRF_COOKIE, csrfToken, CSRF_COOKIE_OPTIONS);
  return csrfToken;
}

function clientInfo(req: Request) {
  return { ip: req.ip, userAgent: req.get('user-agent') };
}

export function createAuthController({ auth, tokens }: { auth: AuthService; tokens: TokenService }) {
  const readPending = (req: Request) => tokens.readPending(readCookie(req, PENDING_LOGIN_COOKIE));

  return {
    login: asyncHandler(async (req: Request, res: Response) => {
      const { identifier }: LoginInput = req.body;
      const result = await auth.submitIdentifier(identifier);

      res.cookie(PENDING_LOGIN_COOKIE, tokens.signPending(result.pending), {
        ...COOKIE_OPTIONS,
        maxAge: tokens.pendingMaxAgeMs,
      });

      res.json({
        success: true,
        data: {
          state: result.state,
          next: result.next,
          identifierType: result.identifierType,
          message: result.message,
        },
      });
    }),

    verify: asyncHandler(async (req: Request, res: Response) => {
      const { code }: VerifyOtpInput = req.body;

      try {
        const result = await auth.submitCode(readPending(req), code, clientInfo(req));

        res.clearCookie(PENDING_LOGIN_COOKIE, COOKIE_OPTIONS);
        res.cookie(
          ACCESS_TOKEN_COOKIE,
          tokens.signAccess({ userId: result.user.id, sid: result.session.sessionKey }),
          { ...COOKIE_OPTIONS, maxAge: tokens.accessMaxAgeMs },
        );
        const csrfToken = issueCsrfCookie(res);

        res.json({
          success: true,
          data: {
            user: result.user,
            state: result.state,
            next: result.next,
            message: result.message,
            csrfToken,
          },
        });
      } catch (error) {
        // Locked code or lost context: the client has to start over at login
        if (error instanceof AppError && error.details?.restart === true) {
          res.clearCookie(PENDING_LOGIN_COOKIE, COOKIE_OPTIONS);
        }
        throw error;
      }
    }),

    resend: asyncHandler(async (req: Request, res: Response) => {
      const input: ResendOtpInput = req.body;
      const result = await auth.resendCode(input, readPending(req));

      res.cookie(PENDING_LOGIN_COOKIE, tokens.signPending(result.pending), {
        ...COOKIE_OPTIONS,
        maxAge: tokens.pendingMaxAgeMs,
      });

      res.json({
        success: true,
        data: { state: result.state, next: result.next, message: result.message },
      });
    }),

    logout: asyncHandler(async (req: Request, res: Response) => {
      const { userId, sessionKey } = currentAuth(req);
      const result = await auth.logout(userId, sessionKey);

      res.clearCookie(ACCESS_TOKEN_COOKIE, COOKIE_OPTIONS);
      res.clearCookie(PENDING_LOGIN_COOKIE, COOKIE_OPTIONS);
      res.clearCookie(CSRF_COOKIE, CSRF_COOKIE_OPTIONS);

      res.json({ success: true, data: { ...result, message: 'Logged out successfully' } });
    }),

    me: asyncHandler(async (req: Request, res: Response) => {
      const { userId } = currentAuth(req);
      const summary = await auth.describe(userId);
      res.json({
        success: true,
        data: { user: summary.user, state: summary.state, next: summary.next },
      });
    }),

    home: asyncHandler(async (req: Request, res: Response) => {
      const { userId } = currentAuth(req);
      const summary = await auth.describe(userId);
      res.json({
        success: true,
        data: {
          user: summary.user,
          identifier: summary.identifier,
          fullName: summary.fullName,
          hasProfile: summary.hasProfile,
          state: summary.state,
        },
      });
    }),
  };
}

export type AuthController = ReturnType<typeof createAuthController>;
