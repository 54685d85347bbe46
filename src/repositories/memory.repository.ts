import { v4 as uuidv4 } from 'uuid';
import { AppError, ErrorCode } from '../utils/appError.js';
import { DEFAULT_COUNTRY } from '../utils/constants.js';
import type {
  OtpRecord,
  ProfileRecord,
  Repositories,
  SessionRecord,
  Store,
  UserRecord,
} from './types.js';

interface MemoryTables {
  readonly users: Map<string, UserRecord & { passwordHash: string }>;
  readonly otps: Map<string, OtpRecord>;
  readonly sessions: Map<string, SessionRecord>;
  readonly profiles: Map<string, ProfileRecord>;
}

function newest<T extends { createdAt: Date }>(rows: T[]): T | null {
  if (rows.length === 0) return null;
  return rows.reduce((a, b) => (b.createdAt.getTime() >= a.createdAt.getTime() ? b : a));
}

// Records leave the store as copies so callers can't mutate rows behind its back
const copy = <T extends object>(row: T): T => ({ ...row });

function stripPassword(row: UserRecord & { passwordHash: string }): UserRecord {
  const { passwordHash: _passwordHash, ...user } = row;
  return user;
}

type UndoLog = Array<() => void>;

function createRepositories(tables: MemoryTables, undo?: UndoLog): Repositories {
  // Inside a transaction, log a row's prior state before each write to it
  const remember = <T extends object>(table: Map<string, T>, key: string): void => {
    if (!undo) return;
    const prior = table.get(key);
    const saved = prior ? copy(prior) : undefined;
    undo.push(() => {
      if (saved) table.set(key, saved);
      else table.delete(key);
    });
  };

  return {
    users: {
      async findById(id) {
        const row = tables.users.get(id);
        return row ? stripPassword(row) : null;
      },

      async findByMobile(mobile) {
        const row = [...tables.users.values()].find((u) => u.mobile === mobile);
        return row ? stripPassword(row) : null;
      },

      async findByEmail(email) {
        const needle = email.toLowerCase();
        const row = [...tables.users.values()].find((u) => u.email === needle);
        return row ? stripPassword(row) : null;
      },

      async create(input) {
        if (!input.mobile && !input.email) {
          throw AppError.badRequest('Either mobile number or email must be provided.');
        }
        const email = input.email ? input.email.toLowerCase() : null;
        const clash = [...tables.users.values()].some(
          (u) => (input.mobile !== null && u.mobile === input.mobile) || (email !== null && u.email === email),
        );
        if (clash) {
          throw AppError.conflict('Identifier already registered', ErrorCode.DUPLICATE_ENTRY);
        }
        const now = new Date();
        const row = {
          id: uuidv4(),
          mobile: input.mobile,
          email,
          passwordHash: input.passwordHash,
          firstName: '',
          lastName: '',
          isActive: true,
          createdAt: now,
          updatedAt: now,
        };
        remember(tables.users, row.id);
        tables.users.set(row.id, row);
        return stripPassword(row);
      },

      async updateNames(id, firstName, lastName) {
        const row = tables.users.get(id);
        if (!row) return null;
        remember(tables.users, id);
        row.firstName = firstName;
        row.lastName = lastName;
        row.updatedAt = new Date();
        return stripPassword(row);
      },

      async deleteCascade(id) {
        remember(tables.users, id);
        tables.users.delete(id);
        for (const [key, otp] of tables.otps) {
          if (otp.userId !== id) continue;
          remember(tables.otps, key);
          tables.otps.delete(key);
        }
        for (const [key, session] of tables.sessions) {
          if (session.userId !== id) continue;
          remember(tables.sessions, key);
          tables.sessions.delete(key);
        }
        remember(tables.profiles, id);
        tables.profiles.delete(id);
      },
    },

    otps: {
      async create(input) {
        const row: OtpRecord = {
          id: uuidv4(),
          userId: input.userId,
          code: input.code,
          isUsed: false,
          attempts: 0,
          maxAttempts: input.maxAttempts,
          createdAt: new Date(),
          expiresAt: input.expiresAt,
        };
        remember(tables.otps, row.id);
        tables.otps.set(row.id, row);
        return copy(row);
      },

      async findUnusedByCode(userId, code, liveAt) {
        const rows = [...tables.otps.values()].filter(
          (o) =>
            o.userId === userId &&
            o.code === code &&
            !o.isUsed &&
            (!liveAt || o.expiresAt.getTime() > liveAt.getTime()),
        );
        const row = newest(rows);
        return row ? copy(row) : null;
      },

      async findLatestLive(userId, liveAt) {
        const rows = [...tables.otps.values()].filter(
          (o) => o.userId === userId && !o.isUsed && o.expiresAt.getTime() > liveAt.getTime(),
        );
        const row = newest(rows);
        return row ? copy(row) : null;
      },

      async findLatestUsable(userId, liveAt) {
        const rows = [...tables.otps.values()].filter(
          (o) =>
            o.userId === userId &&
            !o.isUsed &&
            o.attempts < o.maxAttempts &&
            o.expiresAt.getTime() > liveAt.getTime(),
        );
        const row = newest(rows);
        return row ? copy(row) : null;
      },

      async countCreatedSince(userId, since) {
        return [...tables.otps.values()].filter(
          (o) => o.userId === userId && o.createdAt.getTime() >= since.getTime(),
        ).length;
      },

      async incrementAttempts(id) {
        const row = tables.otps.get(id);
        if (!row) return null;
        remember(tables.otps, id);
        row.attempts += 1;
        return copy(row);
      },

      async markUsed(id) {
        const row = tables.otps.get(id);
        if (!row || row.isUsed || row.attempts >= row.maxAttempts) return false;
        remember(tables.otps, id);
        row.isUsed = true;
        return true;
      },

      async delete(id) {
        remember(tables.otps, id);
        tables.otps.delete(id);
      },

      async deleteExpiredBefore(cutoff) {
        let removed = 0;
        for (const [key, otp] of tables.otps) {
          if (otp.expiresAt.getTime() < cutoff.getTime()) {
            remember(tables.otps, key);
            tables.otps.delete(key);
            removed++;
          }
        }
        return removed;
      },
    },

    sessions: {
      async create(input) {
        const now = new Date();
        const row: SessionRecord = {
          id: uuidv4(),
          userId: input.userId,
          sessionKey: input.sessionKey,
          ipAddress: input.ipAddress,
          userAgent: input.userAgent,
          isActive: true,
          createdAt: now,
          lastActivity: now,
        };
        remember(tables.sessions, row.sessionKey);
        tables.sessions.set(row.sessionKey, row);
        return copy(row);
      },

      async findActiveByKey(sessionKey) {
        const row = tables.sessions.get(sessionKey);
        return row && row.isActive ? copy(row) : null;
      },

      async deactivate(userId, sessionKey) {
        const row = tables.sessions.get(sessionKey);
        if (!row || row.userId !== userId || !row.isActive) return false;
        remember(tables.sessions, sessionKey);
        row.isActive = false;
        return true;
      },

      async touch(sessionKey, at) {
        const row = tables.sessions.get(sessionKey);
        if (!row || !row.isActive) return;
        remember(tables.sessions, sessionKey);
        row.lastActivity = at;
      },

      async listByUser(userId) {
        return [...tables.sessions.values()]
          .filter((s) => s.userId === userId)
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map(copy);
      },
    },

    profiles: {
      async findByUserId(userId) {
        const row = tables.profiles.get(userId);
        return row ? copy(row) : null;
      },

      async create(userId, fields) {
        if (!tables.users.has(userId)) {
          throw AppError.notFound('User not found');
        }
        if (tables.profiles.has(userId)) {
          throw AppError.conflict('Profile already exists', ErrorCode.DUPLICATE_ENTRY);
        }
        const now = new Date();
        const row: ProfileRecord = {
          ...fields,
          country: fields.country || DEFAULT_COUNTRY,
          id: uuidv4(),
          userId,
          createdAt: now,
          updatedAt: now,
        };
        remember(tables.profiles, userId);
        tables.profiles.set(userId, row);
        return copy(row);
      },

      async update(userId, fields) {
        const row = tables.profiles.get(userId);
        if (!row) return null;
        const updated: ProfileRecord = { ...row, ...fields, updatedAt: new Date() };
        remember(tables.profiles, userId);
        tables.profiles.set(userId, updated);
        return copy(updated);
      },
    },
  };
}

/**
 * Process-local store for tests and single-instance development.
 * A transaction logs the prior state of each row it writes and, if `fn`
 * throws, puts back only those rows. Writes made outside it survive.
 */
export function createMemoryStore(): Store {
  const tables: MemoryTables = {
    users: new Map(),
    otps: new Map(),
    sessions: new Map(),
    profiles: new Map(),
  };

  return {
    ...createRepositories(tables),
    async transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
      const undo: UndoLog = [];
      try {
        return await fn(createRepositories(tables, undo));
      } catch (error) {
        for (const step of undo.reverse()) step();
        throw error;
      }
    },
  };
}
