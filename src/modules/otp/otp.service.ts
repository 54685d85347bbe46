import { addMinutes } from 'date-fns';
import type { OtpConfig } from '../../config/env.js';
import type { OtpRecord, OtpRepository } from '../../repositories/types.js';
import { logger } from '../../utils/logger.js';

export function isExpired(otp: Pick<OtpRecord, 'expiresAt'>, now = new Date()): boolean {
  return now.getTime() > otp.expiresAt.getTime();
}

/**
 * A code is usable only while unused, unexpired and under its attempt ceiling.
 */
export function isValid(
  otp: Pick<OtpRecord, 'isUsed' | 'expiresAt' | 'attempts' | 'maxAttempts'>,
  now = new Date(),
): boolean {
  return !otp.isUsed && !isExpired(otp, now) && otp.attempts < otp.maxAttempts;
}

export interface OtpServiceDeps {
  otps: OtpRepository;
  config: OtpConfig;
}

export type OtpService = ReturnType<typeof createOtpService>;

export function createOtpService({ otps, config }: OtpServiceDeps) {
  return {
    isExpired,
    isValid,

    create(userId: string, code: string, ttlMinutes = config.expiryMinutes): Promise<OtpRecord> {
      return otps.create({
        userId,
        code,
        maxAttempts: config.maxAttempts,
        expiresAt: addMinutes(new Date(), ttlMinutes),
      });
    },

    /** Newest unused, unexpired OTP for the user carrying this code. */
    findLiveByCode(userId: string, code: string): Promise<OtpRecord | null> {
      return otps.findUnusedByCode(userId, code, new Date());
    },

    /** Newest unused OTP with this code, whether or not it has expired. */
    findUnusedByCode(userId: string, code: string): Promise<OtpRecord | null> {
      return otps.findUnusedByCode(userId, code);
    },

    findLatestLive(userId: string): Promise<OtpRecord | null> {
      return otps.findLatestLive(userId, new Date());
    },

    /** Newest live OTP that still has attempts left. */
    findLatestUsable(userId: string): Promise<OtpRecord | null> {
      return otps.findLatestUsable(userId, new Date());
    },

    countRecent(userId: string, since: Date): Promise<number> {
      return otps.countCreatedSince(userId, since);
    },

    recordAttempt(otp: OtpRecord): Promise<OtpRecord | null> {
      return otps.incrementAttempts(otp.id);
    },

    /** False when another request already consumed or locked the code. */
    markUsed(otp: OtpRecord): Promise<boolean> {
      return otps.markUsed(otp.id);
    },

    remove(otp: OtpRecord): Promise<void> {
      return otps.delete(otp.id);
    },

    async sweepExpired(): Promise<number> {
      const count = await otps.deleteExpiredBefore(new Date());
      if (count > 0) {
        logger.info(`Cleaned up ${count} expired OTPs`);
      }
      return count;
    },
  };
}
