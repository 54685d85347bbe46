import type { SessionRecord, SessionRepository } from '../../repositories/types.js';
import { generateSessionKey } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';

export interface ClientInfo {
  ip?: string;
  userAgent?: string;
}

export type SessionService = ReturnType<typeof createSessionService>;

export function createSessionService({ sessions }: { sessions: SessionRepository }) {
  return {
    open(userId: string, client: ClientInfo = {}): Promise<SessionRecord> {
      return sessions.create({
        userId,
        sessionKey: generateSessionKey(),
        ipAddress: client.ip ?? null,
        userAgent: client.userAgent ?? '',
      });
    },

    /**
     * Deactivate the session; the row stays for audit. Closing an unknown
     * session is not an error.
     */
    async close(userId: string, sessionKey: string): Promise<void> {
      try {
        const closed = await sessions.deactivate(userId, sessionKey);
        if (!closed) {
          logger.debug('No active session to close', { userId });
        }
      } catch (error) {
        logger.error('Error deactivating session:', { userId, error });
      }
    },

    findActive(sessionKey: string): Promise<SessionRecord | null> {
      return sessions.findActiveByKey(sessionKey);
    },

    touch(sessionKey: string): Promise<void> {
      return sessions.touch(sessionKey, new Date());
    },
  };
}
