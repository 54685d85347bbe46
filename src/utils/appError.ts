// ── Error Codes ──
export enum ErrorCode {
  // Auth
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_INVALID = 'TOKEN_INVALID',
  SESSION_INACTIVE = 'SESSION_INACTIVE',
  ACCOUNT_DISABLED = 'ACCOUNT_DISABLED',
  LOGIN_REQUIRED = 'LOGIN_REQUIRED',

  // OTP
  OTP_INVALID = 'OTP_INVALID',
  OTP_MAX_ATTEMPTS = 'OTP_MAX_ATTEMPTS',
  OTP_DELIVERY_FAILED = 'OTP_DELIVERY_FAILED',

  // Profile
  PROFILE_EXISTS = 'PROFILE_EXISTS',
  PROFILE_REQUIRED = 'PROFILE_REQUIRED',
  PROFILE_SAVE_FAILED = 'PROFILE_SAVE_FAILED',

  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',

  // Resources
  NOT_FOUND = 'NOT_FOUND',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  CONFLICT = 'CONFLICT',

  // State machine
  INVALID_TRANSITION = 'INVALID_TRANSITION',

  // Rate limiting
  RATE_LIMITED = 'RATE_LIMITED',

  // Server
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code = ErrorCode.VALIDATION_ERROR, details?: Record<string, unknown>) {
    return new AppError(message, 400, code, details);
  }

  static unauthorized(message = 'Unauthorized', code = ErrorCode.UNAUTHORIZED) {
    return new AppError(message, 401, code);
  }

  static forbidden(message = 'Forbidden', code = ErrorCode.FORBIDDEN) {
    return new AppError(message, 403, code);
  }

  static notFound(message = 'Resource not found') {
    return new AppError(message, 404, ErrorCode.NOT_FOUND);
  }

  static conflict(message: string, code = ErrorCode.CONFLICT, details?: Record<string, unknown>) {
    return new AppError(message, 409, code, details);
  }

  static tooMany(message = 'Too many requests') {
    return new AppError(message, 429, ErrorCode.RATE_LIMITED);
  }

  /** Upstream SMS / e-mail delivery failed; the caller has already rolled back. */
  static deliveryFailed(message = 'Failed to send OTP. Please try again.') {
    return new AppError(message, 502, ErrorCode.OTP_DELIVERY_FAILED);
  }

  /** The pending login context is gone; the client must start over at login. */
  static loginRequired(message = 'Please login first') {
    return new AppError(message, 401, ErrorCode.LOGIN_REQUIRED, { restart: true });
  }

  static internal(message = 'Internal server error', code = ErrorCode.INTERNAL_ERROR) {
    return new AppError(message, 500, code, undefined, false);
  }
}
