import { describe, expect, it } from 'vitest';
import { authStateMachine } from './stateMachine.js';
import { AuthState } from './constants.js';
import { AppError, ErrorCode } from './appError.js';

describe('authStateMachine', () => {
  it('allows valid transitions', () => {
    expect(authStateMachine.canTransition(AuthState.ANONYMOUS, AuthState.OTP_PENDING)).toBe(true);
    expect(
      authStateMachine.canTransition(AuthState.PROFILE_INCOMPLETE, AuthState.PROFILE_COMPLETE),
    ).toBe(true);
  });

  it('rejects skipping OTP verification', () => {
    expect(
      authStateMachine.canTransition(AuthState.ANONYMOUS, AuthState.PROFILE_COMPLETE),
    ).toBe(false);
  });

  it('never moves a complete profile back to incomplete', () => {
    expect(authStateMachine.getAllowed(AuthState.PROFILE_COMPLETE)).toEqual([AuthState.ANONYMOUS]);
  });

  it('throws AppError with INVALID_TRANSITION on invalid assertTransition', () => {
    try {
      authStateMachine.assertTransition(AuthState.ANONYMOUS, AuthState.PROFILE_INCOMPLETE);
      throw new Error('Expected transition assertion to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      const appError = error as AppError;
      expect(appError.code).toBe(ErrorCode.INVALID_TRANSITION);
      expect(appError.details).toEqual({
        from: AuthState.ANONYMOUS,
        to: AuthState.PROFILE_INCOMPLETE,
        allowed: [AuthState.OTP_PENDING],
      });
    }
  });
});
