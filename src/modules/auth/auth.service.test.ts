import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAuthService, type PendingLogin } from './auth.service.js';
import { createMemoryStore } from '../../repositories/memory.repository.js';
import type { ProfileFields, Store } from '../../repositories/types.js';
import { ErrorCode } from '../../utils/appError.js';
import { AuthState } from '../../utils/constants.js';

const config = {
  length: 6,
  expiryMinutes: 10,
  maxAttempts: 3,
  resendLimit: 3,
  resendWindowMinutes: 60,
};

const NOW = new Date('2026-03-01T10:00:00.000Z');
const MINUTE = 60 * 1000;

const profileFields: ProfileFields = {
  firstName: 'Ann',
  lastName: 'Lee',
  addressLine1: '1 Main St',
  addressLine2: null,
  city: 'Pune',
  state: 'MH',
  postalCode: '411001',
  country: 'India',
  dateOfBirth: null,
};

function setup(deliver = true) {
  const store = createMemoryStore();
  const sent: Array<{ to: string; code: string }> = [];
  const notifier = {
    send: vi.fn(async (to: string, code: string) => {
      sent.push({ to, code });
      return deliver;
    }),
  };
  const auth = createAuthService({ store, notifier, config, bcryptRounds: 4 });
  const lastCode = () => sent[sent.length - 1]?.code ?? '';
  return { store, notifier, sent, auth, lastCode };
}

function codeNotIn(...codes: Array<string | undefined>): string {
  for (let n = 0; ; n++) {
    const candidate = String(n).padStart(6, '0');
    if (!codes.includes(candidate)) return candidate;
  }
}

async function countOtps(store: Store, userId: string) {
  return store.otps.countCreatedSince(userId, new Date(0));
}

describe('createAuthService', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('submitIdentifier', () => {
    it('signs up an unknown mobile number and sends it a code', async () => {
      const { store, auth, notifier, lastCode } = setup();

      const result = await auth.submitIdentifier('+15551234567');

      const user = await store.users.findByMobile('+15551234567');
      expect(user).toMatchObject({ mobile: '+15551234567', email: null, isActive: true });
      expect(result.pending).toEqual({ identifier: '+15551234567', userId: user?.id, isNewUser: true });
      expect(result.state).toBe(AuthState.OTP_PENDING);
      expect(result.next).toBe('/otp-verification');
      expect(notifier.send).toHaveBeenCalledTimes(1);
      expect(notifier.send).toHaveBeenCalledWith('+15551234567', lastCode());
      expect(lastCode()).toMatch(/^\d{6}$/);
      expect(await countOtps(store, result.pending.userId)).toBe(1);
    });

    it('reuses an existing account and lower-cases e-mail input', async () => {
      const { store, auth, notifier } = setup();
      const user = await store.users.create({ mobile: null, email: 'a@b.com', passwordHash: 'x' });

      const result = await auth.submitIdentifier('  A@B.com ');

      expect(result.pending).toEqual({ identifier: 'a@b.com', userId: user.id, isNewUser: false });
      expect(notifier.send).toHaveBeenCalledWith('a@b.com', expect.stringMatching(/^\d{6}$/));
    });

    it('rejects malformed identifiers without touching the store', async () => {
      const { store, auth, notifier } = setup();

      await expect(auth.submitIdentifier('12ab')).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Please enter a valid mobile number',
      });
      await expect(auth.submitIdentifier('   ')).rejects.toMatchObject({
        message: 'Please enter mobile number or email',
      });
      expect(notifier.send).not.toHaveBeenCalled();
      expect(await store.users.findByMobile('12ab')).toBeNull();
    });

    it('removes the new user and OTP when delivery fails, so a retry is a fresh signup', async () => {
      const failing = setup(false);

      await expect(failing.auth.submitIdentifier('+15551234567')).rejects.toMatchObject({
        statusCode: 502,
        code: ErrorCode.OTP_DELIVERY_FAILED,
      });
      expect(await failing.store.users.findByMobile('+15551234567')).toBeNull();

      failing.notifier.send.mockResolvedValue(true);
      const retry = await failing.auth.submitIdentifier('+15551234567');
      expect(retry.pending.isNewUser).toBe(true);
      expect(await countOtps(failing.store, retry.pending.userId)).toBe(1);
    });

    it('keeps an existing user but drops the undelivered OTP', async () => {
      const { store, auth } = setup(false);
      const user = await store.users.create({ mobile: '+15551234567', email: null, passwordHash: 'x' });

      await expect(auth.submitIdentifier('+15551234567')).rejects.toMatchObject({
        code: ErrorCode.OTP_DELIVERY_FAILED,
      });
      expect(await store.users.findById(user.id)).not.toBeNull();
      expect(await countOtps(store, user.id)).toBe(0);
    });

    it('sweeps expired OTPs on the way in', async () => {
      const { store, auth } = setup();
      const first = await auth.submitIdentifier('+15551234567');

      vi.setSystemTime(new Date(NOW.getTime() + 11 * MINUTE));
      await auth.submitIdentifier('+15551234567');

      expect(await countOtps(store, first.pending.userId)).toBe(1);
    });
  });

  describe('submitCode', () => {
    it('logs a new mobile user in with an incomplete profile', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');

      const result = await auth.submitCode(pending, lastCode(), { ip: '10.0.0.1', userAgent: 'vitest' });

      expect(result.state).toBe(AuthState.PROFILE_INCOMPLETE);
      expect(result.next).toBe('/profile-completion');
      expect(result.message).toBe('Welcome! Please complete your profile.');
      expect(result.user).toMatchObject({ id: pending.userId, mobile: '+15551234567' });
      expect(result.session).toMatchObject({
        userId: pending.userId,
        ipAddress: '10.0.0.1',
        userAgent: 'vitest',
        isActive: true,
      });
      expect(await store.sessions.findActiveByKey(result.session.sessionKey)).not.toBeNull();
      expect(await store.otps.findUnusedByCode(pending.userId, lastCode())).toBeNull();
    });

    it('sends a returning user with a profile straight home without creating another profile', async () => {
      const { store, auth, lastCode } = setup();
      const user = await store.users.create({ mobile: null, email: 'a@b.com', passwordHash: 'x' });
      const existing = await store.profiles.create(user.id, profileFields);

      const { pending } = await auth.submitIdentifier('a@b.com');
      const result = await auth.submitCode(pending, lastCode());

      expect(result.state).toBe(AuthState.PROFILE_COMPLETE);
      expect(result.next).toBe('/home');
      expect(result.message).toBe('Welcome back, Ann!');
      expect(await store.profiles.findByUserId(user.id)).toEqual(existing);
    });

    it('consumes a code once and opens a single session', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const code = lastCode();

      await auth.submitCode(pending, code);
      await expect(auth.submitCode(pending, code)).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCode.OTP_INVALID,
        details: undefined,
      });

      expect(await store.sessions.listByUser(pending.userId)).toHaveLength(1);
    });

    it('lets only one of two simultaneous submissions of the same code through', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const code = lastCode();

      const results = await Promise.allSettled([auth.submitCode(pending, code), auth.submitCode(pending, code)]);

      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
      const failure = results.find((r) => r.status === 'rejected');
      expect(failure).toMatchObject({ reason: { code: ErrorCode.OTP_INVALID } });
      expect(await store.sessions.listByUser(pending.userId)).toHaveLength(1);
    });

    it('charges exactly one attempt to the live OTP for a wrong code', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const before = await store.otps.findLatestLive(pending.userId, NOW);

      await expect(auth.submitCode(pending, codeNotIn(lastCode()))).rejects.toMatchObject({
        code: ErrorCode.OTP_INVALID,
        details: { attemptsRemaining: 2 },
      });

      const after = await store.otps.findLatestLive(pending.userId, NOW);
      expect(before).not.toBeNull();
      expect(after).toEqual({ ...before, attempts: 1 });
    });

    it('locks the code after max wrong attempts even if the right code follows', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const code = lastCode();
      const wrong = codeNotIn(code);

      for (const remaining of [2, 1, 0]) {
        await expect(auth.submitCode(pending, wrong)).rejects.toMatchObject({
          details: { attemptsRemaining: remaining },
        });
      }

      await expect(auth.submitCode(pending, code)).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCode.OTP_MAX_ATTEMPTS,
        details: { restart: true },
      });
      expect(await store.sessions.listByUser(pending.userId)).toHaveLength(0);
    });

    it('restarts login once every live code is locked, however many were sent', async () => {
      const { store, auth, sent } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      vi.setSystemTime(new Date(NOW.getTime() + MINUTE));
      await auth.resendCode({}, pending);
      const [first, second] = sent.map((s) => s.code);
      const wrong = codeNotIn(first, second);

      // The newest code is charged first, then the older one
      for (const remaining of [2, 1, 0, 2, 1, 0]) {
        await expect(auth.submitCode(pending, wrong)).rejects.toMatchObject({
          code: ErrorCode.OTP_INVALID,
          details: { attemptsRemaining: remaining },
        });
      }

      await expect(auth.submitCode(pending, wrong)).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCode.OTP_MAX_ATTEMPTS,
        details: { restart: true },
      });
      await expect(auth.submitCode(pending, first ?? '')).rejects.toMatchObject({
        code: ErrorCode.OTP_MAX_ATTEMPTS,
      });
      expect(await store.otps.findUnusedByCode(pending.userId, first ?? '')).toMatchObject({ attempts: 3 });
      expect(await store.otps.findUnusedByCode(pending.userId, second ?? '')).toMatchObject({ attempts: 3 });
      expect(await store.sessions.listByUser(pending.userId)).toHaveLength(0);
    });

    it('charges the newest live OTP when the code matches no row', async () => {
      const { store, auth, sent } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      vi.setSystemTime(new Date(NOW.getTime() + MINUTE));
      await auth.resendCode({}, pending);
      const [first, second] = sent.map((s) => s.code);

      await expect(auth.submitCode(pending, codeNotIn(first, second))).rejects.toMatchObject({
        code: ErrorCode.OTP_INVALID,
      });

      expect(await store.otps.findUnusedByCode(pending.userId, first ?? '')).toMatchObject({ attempts: 0 });
      expect(await store.otps.findUnusedByCode(pending.userId, second ?? '')).toMatchObject({ attempts: 1 });
    });

    it('rejects a code once it has expired', async () => {
      const { auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');

      vi.setSystemTime(new Date(NOW.getTime() + 11 * MINUTE));
      await expect(auth.submitCode(pending, lastCode())).rejects.toMatchObject({
        code: ErrorCode.OTP_INVALID,
      });
    });

    it('accepts a code right up to its expiry', async () => {
      const { auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');

      vi.setSystemTime(new Date(NOW.getTime() + 10 * MINUTE - 1));
      await expect(auth.submitCode(pending, lastCode())).resolves.toMatchObject({
        state: AuthState.PROFILE_INCOMPLETE,
      });
    });

    it('asks for a fresh login when there is no pending context', async () => {
      const { auth } = setup();
      await expect(auth.submitCode(undefined, '123456')).rejects.toMatchObject({
        statusCode: 401,
        code: ErrorCode.LOGIN_REQUIRED,
        details: { restart: true },
      });
    });

    it('asks for a fresh login when the pending user is gone', async () => {
      const { auth } = setup();
      const pending: PendingLogin = { identifier: '+15551234567', userId: 'missing', isNewUser: true };
      await expect(auth.submitCode(pending, '123456')).rejects.toMatchObject({
        code: ErrorCode.LOGIN_REQUIRED,
      });
    });

    it('rejects codes of the wrong shape before looking anything up', async () => {
      const { auth } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      await expect(auth.submitCode(pending, '12ab56')).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'OTP must be exactly 6 digits',
      });
    });
  });

  describe('resendCode', () => {
    it('allows three codes per window for a known identifier and rejects the fourth', async () => {
      const { store, auth, notifier } = setup();
      const user = await store.users.create({ mobile: '+15551234567', email: null, passwordHash: 'x' });

      for (let i = 0; i < 3; i++) {
        await expect(auth.resendCode({ identifier: '+15551234567' })).resolves.toMatchObject({
          state: AuthState.OTP_PENDING,
        });
      }
      await expect(auth.resendCode({ identifier: '+15551234567' })).rejects.toMatchObject({
        statusCode: 429,
        code: ErrorCode.RATE_LIMITED,
      });

      expect(notifier.send).toHaveBeenCalledTimes(3);
      expect(await countOtps(store, user.id)).toBe(3);
    });

    it('counts the login code towards the limit', async () => {
      const { auth } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');

      await auth.resendCode({}, pending);
      await auth.resendCode({}, pending);
      await expect(auth.resendCode({}, pending)).rejects.toMatchObject({ code: ErrorCode.RATE_LIMITED });
    });

    it('opens up again once the window has rolled past', async () => {
      const { auth } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      await auth.resendCode({}, pending);
      await auth.resendCode({}, pending);

      vi.setSystemTime(new Date(NOW.getTime() + 61 * MINUTE));
      await expect(auth.resendCode({}, pending)).resolves.toMatchObject({
        pending: { userId: pending.userId, isNewUser: true },
      });
    });

    it('rejects an unknown identifier', async () => {
      const { auth } = setup();
      await expect(auth.resendCode({ identifier: 'nobody@example.com' })).rejects.toMatchObject({
        statusCode: 400,
        code: ErrorCode.USER_NOT_FOUND,
      });
    });

    it('needs an identifier from the body or the pending context', async () => {
      const { auth } = setup();
      await expect(auth.resendCode({})).rejects.toMatchObject({ code: ErrorCode.LOGIN_REQUIRED });
    });

    it('drops the OTP and reports a transport error when delivery fails', async () => {
      const { store, auth, notifier } = setup();
      const user = await store.users.create({ mobile: '+15551234567', email: null, passwordHash: 'x' });
      notifier.send.mockResolvedValue(false);

      await expect(auth.resendCode({ identifier: '+15551234567' })).rejects.toMatchObject({
        code: ErrorCode.OTP_DELIVERY_FAILED,
      });
      expect(await countOtps(store, user.id)).toBe(0);
    });
  });

  describe('logout and describe', () => {
    it('deactivates the session but keeps the row', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const { session } = await auth.submitCode(pending, lastCode());

      const result = await auth.logout(pending.userId, session.sessionKey);

      expect(result).toEqual({ state: AuthState.ANONYMOUS, next: '/login' });
      expect(await auth.resolveSession(session.sessionKey)).toBeNull();
      const [row] = await store.sessions.listByUser(pending.userId);
      expect(row).toMatchObject({ sessionKey: session.sessionKey, isActive: false });
    });

    it('touches the session on resolve', async () => {
      const { store, auth, lastCode } = setup();
      const { pending } = await auth.submitIdentifier('+15551234567');
      const { session } = await auth.submitCode(pending, lastCode());

      vi.setSystemTime(new Date(NOW.getTime() + 5 * MINUTE));
      const resolved = await auth.resolveSession(session.sessionKey);
      expect(resolved?.userId).toBe(pending.userId);

      const [row] = await store.sessions.listByUser(pending.userId);
      expect(row?.lastActivity).toEqual(new Date(NOW.getTime() + 5 * MINUTE));
    });

    it('falls back to the identifier until a profile exists', async () => {
      const { store, auth } = setup();
      const user = await store.users.create({ mobile: null, email: 'a@b.com', passwordHash: 'x' });

      expect(await auth.describe(user.id)).toMatchObject({
        identifier: 'a@b.com',
        fullName: 'a@b.com',
        hasProfile: false,
        state: AuthState.PROFILE_INCOMPLETE,
      });

      await store.profiles.create(user.id, profileFields);
      expect(await auth.describe(user.id)).toMatchObject({
        fullName: 'Ann Lee',
        hasProfile: true,
        state: AuthState.PROFILE_COMPLETE,
        next: '/home',
      });
    });

    it('rejects an unknown user', async () => {
      const { auth } = setup();
      await expect(auth.describe('missing')).rejects.toMatchObject({ statusCode: 401 });
    });
  });
});
