// ── Records ──
// Plain data handed across the repository boundary, independent of the driver.

export interface UserRecord {
  id: string;
  mobile: string | null;
  email: string | null;
  firstName: string;
  lastName: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface OtpRecord {
  id: string;
  userId: string;
  code: string;
  isUsed: boolean;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface SessionRecord {
  id: string;
  userId: string;
  sessionKey: string;
  ipAddress: string | null;
  userAgent: string;
  isActive: boolean;
  createdAt: Date;
  lastActivity: Date;
}

export interface ProfileRecord {
  id: string;
  userId: string;
  firstName: string;
  lastName: string;
  addressLine1: string;
  addressLine2: string | null;
  city: string;
  state: string;
  postalCode: string;
  country: string;
  dateOfBirth: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// ── Inputs ──

export interface NewUser {
  mobile: string | null;
  email: string | null;
  passwordHash: string;
}

export interface NewOtp {
  userId: string;
  code: string;
  maxAttempts: number;
  expiresAt: Date;
}

export interface NewSession {
  userId: string;
  sessionKey: string;
  ipAddress: string | null;
  userAgent: string;
}

export type ProfileFields = Omit<ProfileRecord, 'id' | 'userId' | 'createdAt' | 'updatedAt'>;

// ── Repositories ──

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByMobile(mobile: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  /** Rejects when neither mobile nor email is set. */
  create(input: NewUser): Promise<UserRecord>;
  updateNames(id: string, firstName: string, lastName: string): Promise<UserRecord | null>;
  /** Removes the user, then its OTPs, sessions and profile. */
  deleteCascade(id: string): Promise<void>;
}

export interface OtpRepository {
  create(input: NewOtp): Promise<OtpRecord>;
  /** Newest unused OTP for the user with this code, optionally only those expiring after `liveAt`. */
  findUnusedByCode(userId: string, code: string, liveAt?: Date): Promise<OtpRecord | null>;
  /** Newest unused OTP for the user expiring after `liveAt`, locked or not. */
  findLatestLive(userId: string, liveAt: Date): Promise<OtpRecord | null>;
  /** Like `findLatestLive`, but only rows with `attempts < maxAttempts`. */
  findLatestUsable(userId: string, liveAt: Date): Promise<OtpRecord | null>;
  countCreatedSince(userId: string, since: Date): Promise<number>;
  /** Atomic `attempts += 1`; null when the row is gone. */
  incrementAttempts(id: string): Promise<OtpRecord | null>;
  /** Atomic flip of `isUsed` guarded by `isUsed=false` and `attempts < maxAttempts`. */
  markUsed(id: string): Promise<boolean>;
  delete(id: string): Promise<void>;
  deleteExpiredBefore(cutoff: Date): Promise<number>;
}

export interface SessionRepository {
  create(input: NewSession): Promise<SessionRecord>;
  findActiveByKey(sessionKey: string): Promise<SessionRecord | null>;
  /** Returns true when an active row matched and was deactivated. */
  deactivate(userId: string, sessionKey: string): Promise<boolean>;
  touch(sessionKey: string, at: Date): Promise<void>;
  listByUser(userId: string): Promise<SessionRecord[]>;
}

export interface ProfileRepository {
  findByUserId(userId: string): Promise<ProfileRecord | null>;
  create(userId: string, fields: ProfileFields): Promise<ProfileRecord>;
  update(userId: string, fields: ProfileFields): Promise<ProfileRecord | null>;
}

export interface Repositories {
  users: UserRepository;
  otps: OtpRepository;
  sessions: SessionRepository;
  profiles: ProfileRepository;
}

export interface Store extends Repositories {
  /** Runs `fn` against transaction-scoped repositories; all writes commit or none do. */
  transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T>;
}
