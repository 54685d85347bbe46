// ── Identifier Type ──
export enum IdentifierType {
  MOBILE = 'mobile',
  EMAIL = 'email',
}

// ── Auth Flow State ──
export enum AuthState {
  ANONYMOUS = 'anonymous',
  OTP_PENDING = 'otp_pending',
  PROFILE_INCOMPLETE = 'profile_incomplete',
  PROFILE_COMPLETE = 'profile_complete',
}

// ── Client route hint per state ──
export const NEXT_ROUTE: Record<AuthState, string> = {
  [AuthState.ANONYMOUS]: '/login',
  [AuthState.OTP_PENDING]: '/otp-verification',
  [AuthState.PROFILE_INCOMPLETE]: '/profile-completion',
  [AuthState.PROFILE_COMPLETE]: '/home',
};

// ── Profile ──
export const DEFAULT_COUNTRY = 'India';

// ── Cookies ──
export const ACCESS_TOKEN_COOKIE = 'accessToken';
export const PENDING_LOGIN_COOKIE = 'pendingLogin';
export const CSRF_COOKIE = 'csrfToken';
