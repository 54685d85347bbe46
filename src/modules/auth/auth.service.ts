import bcrypt from 'bcryptjs';
import { subMinutes } from 'date-fns';
import type { OtpConfig } from '../../config/env.js';
import type { ProfileRecord, SessionRecord, Store, UserRecord } from '../../repositories/types.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuthState, IdentifierType, NEXT_ROUTE } from '../../utils/constants.js';
import { generateOtp, generatePlaceholderPassword, maskIdentifier } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import { authStateMachine } from '../../utils/stateMachine.js';
import type { Notifier } from '../notifications/notifier.js';
import { createOtpService } from '../otp/otp.service.js';
import { createSessionService, type ClientInfo } from '../sessions/session.service.js';
import { parseIdentifier, type Identifier } from './identifier.js';

/**
 * What the visitor's cookie remembers between login and OTP verification.
 */
export interface PendingLogin {
  identifier: string;
  userId: string;
  isNewUser: boolean;
}

export interface PublicUser {
  id: string;
  mobile: string | null;
  email: string | null;
  firstName: string;
  lastName: string;
}

export interface AuthServiceDeps {
  store: Store;
  notifier: Notifier;
  config: OtpConfig;
  bcryptRounds: number;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    mobile: user.mobile,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
  };
}

export function displayIdentifier(user: Pick<UserRecord, 'mobile' | 'email'>): string {
  return user.mobile ?? user.email ?? '';
}

export function stateForProfile(profile: ProfileRecord | null, isNewUser = false): AuthState {
  return isNewUser || !profile ? AuthState.PROFILE_INCOMPLETE : AuthState.PROFILE_COMPLETE;
}

function requireIdentifier(raw: string): Identifier {
  const result = parseIdentifier(raw);
  if (!result.success) {
    throw AppError.badRequest(result.error, ErrorCode.VALIDATION_ERROR, { field: 'identifier' });
  }
  return result.identifier;
}

export type AuthService = ReturnType<typeof createAuthService>;

export function createAuthService({ store, notifier, config, bcryptRounds }: AuthServiceDeps) {
  const otpService = createOtpService({ otps: store.otps, config });
  const sessionService = createSessionService({ sessions: store.sessions });

  function findUser(identifier: Identifier): Promise<UserRecord | null> {
    return identifier.type === IdentifierType.EMAIL
      ? store.users.findByEmail(identifier.value)
      : store.users.findByMobile(identifier.value);
  }

  async function createUser(identifier: Identifier): Promise<UserRecord> {
    const passwordHash = await bcrypt.hash(generatePlaceholderPassword(), bcryptRounds);
    return store.users.create({
      mobile: identifier.type === IdentifierType.MOBILE ? identifier.value : null,
      email: identifier.type === IdentifierType.EMAIL ? identifier.value : null,
      passwordHash,
    });
  }

  /**
   * Generate, persist and deliver a code. On delivery failure the new OTP
   * row is deleted and `false` is returned.
   */
  async function issueOtp(user: UserRecord, identifier: Identifier): Promise<boolean> {
    const code = generateOtp(config.length);
    const otp = await otpService.create(user.id, code);

    if (await notifier.send(identifier.value, code)) {
      return true;
    }

    await otpService.remove(otp);
    return false;
  }

  // Housekeeping only; a failed sweep must not fail the login request
  async function sweepExpiredOtps(): Promise<void> {
    try {
      await otpService.sweepExpired();
    } catch (error) {
      logger.error('Expired OTP sweep failed:', { error });
    }
  }

  /**
   * Charge a failed guess. The newest unused OTP carrying the submitted code
   * is charged if one exists; otherwise the user's newest usable OTP is, so
   * guessing codes that match no row still burns attempts. `locked` means
   * live codes remain but every one of them is out of attempts.
   */
  async function penaliseWrongCode(
    userId: string,
    code: string,
  ): Promise<{ locked: boolean; attemptsRemaining?: number }> {
    const target =
      (await otpService.findUnusedByCode(userId, code)) ?? (await otpService.findLatestUsable(userId));
    if (!target) {
      return { locked: (await otpService.findLatestLive(userId)) !== null };
    }

    const charged = await otpService.recordAttempt(target);
    if (!charged || otpService.isExpired(charged)) {
      return { locked: false };
    }
    return { locked: false, attemptsRemaining: Math.max(charged.maxAttempts - charged.attempts, 0) };
  }

  function lockedOut(): AppError {
    authStateMachine.assertTransition(AuthState.OTP_PENDING, AuthState.ANONYMOUS);
    return AppError.badRequest(
      'OTP attempts exceeded. Please request a new OTP.',
      ErrorCode.OTP_MAX_ATTEMPTS,
      { restart: true },
    );
  }

  function assertUsable(user: UserRecord): void {
    if (!user.isActive) {
      throw AppError.forbidden('Account is disabled', ErrorCode.ACCOUNT_DISABLED);
    }
  }

  return {
    /**
     * Anonymous → OTP pending. Creates the account on first contact.
     */
    async submitIdentifier(rawIdentifier: string) {
      const identifier = requireIdentifier(rawIdentifier);
      authStateMachine.assertTransition(AuthState.ANONYMOUS, AuthState.OTP_PENDING);

      await sweepExpiredOtps();

      const existing = await findUser(identifier);
      const isNewUser = existing === null;
      const user = existing ?? (await createUser(identifier));
      assertUsable(user);

      if (!(await issueOtp(user, identifier))) {
        if (isNewUser) {
          await store.users.deleteCascade(user.id);
        }
        throw AppError.deliveryFailed();
      }

      if (isNewUser) {
        logger.info('User created on first login', { userId: user.id, via: identifier.type });
      }
      logger.info(`OTP sent to ${maskIdentifier(identifier.value)}`, { userId: user.id });

      const pending: PendingLogin = { identifier: identifier.value, userId: user.id, isNewUser };
      return {
        pending,
        identifierType: identifier.type,
        state: AuthState.OTP_PENDING,
        next: NEXT_ROUTE[AuthState.OTP_PENDING],
        message: `OTP sent to ${identifier.value}`,
      };
    },

    /**
     * OTP pending → authenticated. Opens exactly one session per consumed code.
     */
    async submitCode(pending: PendingLogin | undefined, code: string, client: ClientInfo = {}) {
      await sweepExpiredOtps();

      if (!pending) {
        throw AppError.loginRequired();
      }

      const user = await store.users.findById(pending.userId);
      if (!user) {
        throw AppError.loginRequired('User not found');
      }
      assertUsable(user);

      const submitted = code.trim();
      if (!new RegExp(`^\\d{${config.length}}$`).test(submitted)) {
        throw AppError.badRequest(`OTP must be exactly ${config.length} digits`, ErrorCode.VALIDATION_ERROR, {
          field: 'code',
        });
      }

      const otp = await otpService.findLiveByCode(user.id, submitted);

      // Live and unused, so only the attempt ceiling can make it invalid
      if (otp && !otpService.isValid(otp)) {
        throw lockedOut();
      }

      if (!otp || !(await otpService.markUsed(otp))) {
        const { locked, attemptsRemaining } = await penaliseWrongCode(user.id, submitted);
        if (locked) {
          logger.warn('OTP guessed after every live code was locked', { userId: user.id });
          throw lockedOut();
        }
        logger.warn('Invalid OTP submitted', { userId: user.id, attemptsRemaining });
        throw AppError.badRequest(
          'Invalid OTP. Please try again.',
          ErrorCode.OTP_INVALID,
          attemptsRemaining === undefined ? undefined : { attemptsRemaining },
        );
      }

      const session: SessionRecord = await sessionService.open(user.id, client);
      const profile = await store.profiles.findByUserId(user.id);
      const state = stateForProfile(profile, pending.isNewUser);
      authStateMachine.assertTransition(AuthState.OTP_PENDING, state);

      logger.info('User logged in', { userId: user.id, ip: client.ip });

      return {
        user: toPublicUser(user),
        session,
        state,
        next: NEXT_ROUTE[state],
        message:
          state === AuthState.PROFILE_COMPLETE && profile
            ? `Welcome back, ${profile.firstName}!`
            : 'Welcome! Please complete your profile.',
      };
    },

    /**
     * Issue another code for a known identifier, at most `resendLimit` per
     * user in the rolling window.
     */
    async resendCode(input: { identifier?: string }, pending?: PendingLogin) {
      const raw = input.identifier ?? pending?.identifier;
      if (!raw) {
        throw AppError.loginRequired('Identifier is required');
      }
      const identifier = requireIdentifier(raw);

      const user = await findUser(identifier);
      if (!user) {
        throw AppError.badRequest('User not found', ErrorCode.USER_NOT_FOUND);
      }
      assertUsable(user);

      const since = subMinutes(new Date(), config.resendWindowMinutes);
      const recent = await otpService.countRecent(user.id, since);
      if (recent >= config.resendLimit) {
        logger.warn('OTP resend throttled', { userId: user.id, recent });
        throw AppError.tooMany('Too many OTP requests. Please wait before requesting another.');
      }

      if (!(await issueOtp(user, identifier))) {
        throw AppError.deliveryFailed();
      }

      logger.info(`OTP resent to ${maskIdentifier(identifier.value)}`, { userId: user.id });

      const nextPending: PendingLogin = {
        identifier: identifier.value,
        userId: user.id,
        isNewUser: pending?.userId === user.id ? pending.isNewUser : false,
      };
      return {
        pending: nextPending,
        state: AuthState.OTP_PENDING,
        next: NEXT_ROUTE[AuthState.OTP_PENDING],
        message: 'OTP resent successfully',
      };
    },

    /**
     * Any authenticated state → anonymous.
     */
    async logout(userId: string, sessionKey: string) {
      await sessionService.close(userId, sessionKey);
      logger.info('User logged out', { userId });
      return { state: AuthState.ANONYMOUS, next: NEXT_ROUTE[AuthState.ANONYMOUS] };
    },

    /**
     * Who is logged in and where the flow stands; backs `/auth/me` and `/home`.
     */
    async describe(userId: string) {
      const user = await store.users.findById(userId);
      if (!user) {
        throw AppError.unauthorized('User not found', ErrorCode.TOKEN_INVALID);
      }
      const profile = await store.profiles.findByUserId(userId);
      const state = stateForProfile(profile);
      return {
        user: toPublicUser(user),
        identifier: displayIdentifier(user),
        fullName: profile ? `${profile.firstName} ${profile.lastName}` : displayIdentifier(user),
        hasProfile: profile !== null,
        state,
        next: NEXT_ROUTE[state],
      };
    },

    /**
     * Resolve an access token's session; null once logged out.
     */
    async resolveSession(sessionKey: string) {
      const session = await sessionService.findActive(sessionKey);
      if (!session) return null;
      await sessionService.touch(sessionKey);
      return session;
    },
  };
}
