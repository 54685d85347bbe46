import { AuthState } from './constants.js';
import { AppError, ErrorCode } from './appError.js';

// ── Generic State Machine Type ──
type TransitionMap<T extends string> = Record<T, T[]>;

export interface StateMachine<T extends string> {
  canTransition(from: T, to: T): boolean;
  assertTransition(from: T, to: T): void;
  getAllowed(from: T): T[];
}

export function createStateMachine<T extends string>(transitions: TransitionMap<T>): StateMachine<T> {
  return {
    canTransition(from: T, to: T): boolean {
      return transitions[from]?.includes(to) ?? false;
    },
    assertTransition(from: T, to: T): void {
      if (!this.canTransition(from, to)) {
        throw AppError.badRequest(
          `Invalid auth transition: ${from} → ${to}`,
          ErrorCode.INVALID_TRANSITION,
          { from, to, allowed: transitions[from] || [] },
        );
      }
    },
    getAllowed(from: T): T[] {
      return transitions[from] || [];
    },
  };
}

// ── Login Flow State Machine ──
export const authStateMachine = createStateMachine<AuthState>({
  [AuthState.ANONYMOUS]: [AuthState.OTP_PENDING],
  [AuthState.OTP_PENDING]: [
    AuthState.OTP_PENDING, // resend, or a wrong code
    AuthState.PROFILE_INCOMPLETE,
    AuthState.PROFILE_COMPLETE,
    AuthState.ANONYMOUS, // forced restart after too many attempts
  ],
  [AuthState.PROFILE_INCOMPLETE]: [AuthState.PROFILE_COMPLETE, AuthState.ANONYMOUS],
  [AuthState.PROFILE_COMPLETE]: [AuthState.ANONYMOUS],
});
