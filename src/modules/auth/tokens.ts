import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { PendingLogin } from './auth.service.js';

const ACCESS_AUDIENCE = 'access';
const PENDING_AUDIENCE = 'otp-pending';

const accessClaimsSchema = z.object({
  userId: z.string().min(1),
  sid: z.string().min(1),
});

const pendingClaimsSchema = z.object({
  identifier: z.string().min(1),
  userId: z.string().min(1),
  isNewUser: z.boolean(),
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;

export interface TokenConfig {
  accessSecret: string;
  accessExpiryMinutes: number;
  pendingSecret: string;
  pendingExpiryMinutes: number;
}

export type TokenService = ReturnType<typeof createTokenService>;

/**
 * Signed cookies for the two halves of the flow: the short-lived pending
 * login context and the access token bound to a server-side session.
 */
export function createTokenService(config: TokenConfig) {
  return {
    signAccess(claims: AccessClaims): string {
      return jwt.sign(claims, config.accessSecret, {
        audience: ACCESS_AUDIENCE,
        expiresIn: config.accessExpiryMinutes * 60,
      });
    },

    /** Throws jsonwebtoken's errors for expired or tampered tokens. */
    verifyAccess(token: string): AccessClaims {
      const decoded = jwt.verify(token, config.accessSecret, { audience: ACCESS_AUDIENCE });
      return accessClaimsSchema.parse(decoded);
    },

    signPending(pending: PendingLogin): string {
      const { identifier, userId, isNewUser } = pending;
      return jwt.sign({ identifier, userId, isNewUser }, config.pendingSecret, {
        audience: PENDING_AUDIENCE,
        expiresIn: config.pendingExpiryMinutes * 60,
      });
    },

    /**
     * A missing, expired or forged cookie all mean the same thing to the
     * flow: there is no pending login.
     */
    readPending(token: string | undefined): PendingLogin | undefined {
      if (!token) return undefined;
      try {
        const decoded = jwt.verify(token, config.pendingSecret, { audience: PENDING_AUDIENCE });
        const parsed = pendingClaimsSchema.safeParse(decoded);
        return parsed.success ? parsed.data : undefined;
      } catch (error) {
        if (error instanceof jwt.JsonWebTokenError) return undefined;
        throw error;
      }
    },

    pendingMaxAgeMs: config.pendingExpiryMinutes * 60 * 1000,
    accessMaxAgeMs: config.accessExpiryMinutes * 60 * 1000,
  };
}
