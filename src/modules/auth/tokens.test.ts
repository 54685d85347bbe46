import { afterEach, describe, expect, it, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { createTokenService } from './tokens.js';

const tokens = createTokenService({
  accessSecret: 'test-access-secret',
  accessExpiryMinutes: 60,
  pendingSecret: 'test-pending-secret',
  pendingExpiryMinutes: 10,
});

const pending = { identifier: '+15551234567', userId: 'u1', isNewUser: true };

describe('createTokenService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reads back the pending login it signed', () => {
    expect(tokens.readPending(tokens.signPending(pending))).toEqual(pending);
  });

  it('treats missing, forged and expired pending cookies as no pending login', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
    const signed = tokens.signPending(pending);

    expect(tokens.readPending(undefined)).toBeUndefined();
    expect(tokens.readPending(jwt.sign(pending, 'test-other-secret', { audience: 'otp-pending' }))).toBeUndefined();

    vi.setSystemTime(new Date('2026-03-01T10:11:00.000Z'));
    expect(tokens.readPending(signed)).toBeUndefined();
  });

  it('keeps access and pending tokens apart', () => {
    const access = tokens.signAccess({ userId: 'u1', sid: 'abc' });

    expect(tokens.verifyAccess(access)).toEqual({ userId: 'u1', sid: 'abc' });
    expect(tokens.readPending(access)).toBeUndefined();
    expect(() => tokens.verifyAccess(tokens.signPending(pending))).toThrow(jwt.JsonWebTokenError);
  });

  it('exposes cookie lifetimes in milliseconds', () => {
    expect(tokens.pendingMaxAgeMs).toBe(600_000);
    expect(tokens.accessMaxAgeMs).toBe(3_600_000);
  });
});
