import mongoose, { Types, type ClientSession } from 'mongoose';
import {
  User,
  Otp,
  UserSession,
  UserProfile,
  type IUser,
  type IOtp,
  type IUserSession,
  type IUserProfile,
} from '../models/index.js';
import type {
  OtpRecord,
  OtpRepository,
  ProfileRecord,
  ProfileRepository,
  Repositories,
  SessionRecord,
  SessionRepository,
  Store,
  UserRecord,
  UserRepository,
} from './types.js';

// ── Document → record mapping ──

function toUserRecord(doc: IUser): UserRecord {
  return {
    id: doc._id.toString(),
    mobile: doc.mobile ?? null,
    email: doc.email ?? null,
    firstName: doc.firstName,
    lastName: doc.lastName,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toOtpRecord(doc: IOtp): OtpRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    code: doc.code,
    isUsed: doc.isUsed,
    attempts: doc.attempts,
    maxAttempts: doc.maxAttempts,
    createdAt: doc.createdAt,
    expiresAt: doc.expiresAt,
  };
}

function toSessionRecord(doc: IUserSession): SessionRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    sessionKey: doc.sessionKey,
    ipAddress: doc.ipAddress ?? null,
    userAgent: doc.userAgent,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    lastActivity: doc.lastActivity,
  };
}

function toProfileRecord(doc: IUserProfile): ProfileRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    firstName: doc.firstName,
    lastName: doc.lastName,
    addressLine1: doc.addressLine1,
    addressLine2: doc.addressLine2 ?? null,
    city: doc.city,
    state: doc.state,
    postalCode: doc.postalCode,
    country: doc.country,
    dateOfBirth: doc.dateOfBirth ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

// Ids come from our own tokens, but a malformed one must read as "not found", not a CastError
const isObjectId = (id: string): boolean => Types.ObjectId.isValid(id);

// Write options take `session` as optional, never null
const withSession = (session: ClientSession | null) => (session ? { session } : {});

// ── Repositories ──

function createUserRepository(session: ClientSession | null): UserRepository {
  return {
    async findById(id) {
      if (!isObjectId(id)) return null;
      const doc = await User.findById(id).session(session);
      return doc ? toUserRecord(doc) : null;
    },

    async findByMobile(mobile) {
      const doc = await User.findOne({ mobile }).session(session);
      return doc ? toUserRecord(doc) : null;
    },

    async findByEmail(email) {
      const doc = await User.findOne({ email: email.toLowerCase() }).session(session);
      return doc ? toUserRecord(doc) : null;
    },

    async create(input) {
      const [doc] = await User.create(
        [{ mobile: input.mobile, email: input.email, password: input.passwordHash }],
        withSession(session),
      );
      return toUserRecord(doc);
    },

    async updateNames(id, firstName, lastName) {
      if (!isObjectId(id)) return null;
      const doc = await User.findByIdAndUpdate(
        id,
        { $set: { firstName, lastName } },
        { new: true, runValidators: true, ...withSession(session) },
      );
      return doc ? toUserRecord(doc) : null;
    },

    async deleteCascade(id) {
      if (!isObjectId(id)) return;
      const userId = new Types.ObjectId(id);
      // User first, so a failed later delete leaves only orphaned rows
      await User.deleteOne({ _id: userId }, withSession(session));
      await Otp.deleteMany({ userId }, withSession(session));
      await UserSession.deleteMany({ userId }, withSession(session));
      await UserProfile.deleteOne({ userId }, withSession(session));
    },
  };
}

function createOtpRepository(session: ClientSession | null): OtpRepository {
  return {
    async create(input) {
      const [doc] = await Otp.create(
        [
          {
            userId: new Types.ObjectId(input.userId),
            code: input.code,
            maxAttempts: input.maxAttempts,
            expiresAt: input.expiresAt,
          },
        ],
        withSession(session),
      );
      return toOtpRecord(doc);
    },

    async findUnusedByCode(userId, code, liveAt) {
      if (!isObjectId(userId)) return null;
      const doc = await Otp.findOne({
        userId,
        code,
        isUsed: false,
        ...(liveAt ? { expiresAt: { $gt: liveAt } } : {}),
      })
        .sort({ createdAt: -1 })
        .session(session);
      return doc ? toOtpRecord(doc) : null;
    },

    async findLatestLive(userId, liveAt) {
      if (!isObjectId(userId)) return null;
      const doc = await Otp.findOne({ userId, isUsed: false, expiresAt: { $gt: liveAt } })
        .sort({ createdAt: -1 })
        .session(session);
      return doc ? toOtpRecord(doc) : null;
    },

    async findLatestUsable(userId, liveAt) {
      if (!isObjectId(userId)) return null;
      const doc = await Otp.findOne({
        userId,
        isUsed: false,
        expiresAt: { $gt: liveAt },
        $expr: { $lt: ['$attempts', '$maxAttempts'] },
      })
        .sort({ createdAt: -1 })
        .session(session);
      return doc ? toOtpRecord(doc) : null;
    },

    async countCreatedSince(userId, since) {
      if (!isObjectId(userId)) return 0;
      return Otp.countDocuments({ userId, createdAt: { $gte: since } }).session(session);
    },

    async incrementAttempts(id) {
      const doc = await Otp.findByIdAndUpdate(
        id,
        { $inc: { attempts: 1 } },
        { new: true, ...withSession(session) },
      );
      return doc ? toOtpRecord(doc) : null;
    },

    async markUsed(id) {
      const result = await Otp.updateOne(
        { _id: id, isUsed: false, $expr: { $lt: ['$attempts', '$maxAttempts'] } },
        { $set: { isUsed: true } },
        withSession(session),
      );
      return result.modifiedCount === 1;
    },

    async delete(id) {
      await Otp.deleteOne({ _id: id }, withSession(session));
    },

    async deleteExpiredBefore(cutoff) {
      const result = await Otp.deleteMany({ expiresAt: { $lt: cutoff } }, withSession(session));
      return result.deletedCount;
    },
  };
}

function createSessionRepository(session: ClientSession | null): SessionRepository {
  return {
    async create(input) {
      const [doc] = await UserSession.create(
        [
          {
            userId: new Types.ObjectId(input.userId),
            sessionKey: input.sessionKey,
            ipAddress: input.ipAddress,
            userAgent: input.userAgent,
          },
        ],
        withSession(session),
      );
      return toSessionRecord(doc);
    },

    async findActiveByKey(sessionKey) {
      const doc = await UserSession.findOne({ sessionKey, isActive: true }).session(session);
      return doc ? toSessionRecord(doc) : null;
    },

    async deactivate(userId, sessionKey) {
      if (!isObjectId(userId)) return false;
      const result = await UserSession.updateOne(
        { userId, sessionKey, isActive: true },
        { $set: { isActive: false } },
        withSession(session),
      );
      return result.modifiedCount === 1;
    },

    async touch(sessionKey, at) {
      await UserSession.updateOne(
        { sessionKey, isActive: true },
        { $set: { lastActivity: at } },
        { ...withSession(session), timestamps: false },
      );
    },

    async listByUser(userId) {
      if (!isObjectId(userId)) return [];
      const docs = await UserSession.find({ userId }).sort({ createdAt: -1 }).session(session);
      return docs.map(toSessionRecord);
    },
  };
}

function createProfileRepository(session: ClientSession | null): ProfileRepository {
  return {
    async findByUserId(userId) {
      if (!isObjectId(userId)) return null;
      const doc = await UserProfile.findOne({ userId }).session(session);
      return doc ? toProfileRecord(doc) : null;
    },

    async create(userId, fields) {
      const [doc] = await UserProfile.create(
        [{ ...fields, userId: new Types.ObjectId(userId) }],
        withSession(session),
      );
      return toProfileRecord(doc);
    },

    async update(userId, fields) {
      if (!isObjectId(userId)) return null;
      const doc = await UserProfile.findOneAndUpdate(
        { userId },
        { $set: fields },
        { new: true, runValidators: true, ...withSession(session) },
      );
      return doc ? toProfileRecord(doc) : null;
    },
  };
}

function createRepositories(session: ClientSession | null): Repositories {
  return {
    users: createUserRepository(session),
    otps: createOtpRepository(session),
    sessions: createSessionRepository(session),
    profiles: createProfileRepository(session),
  };
}

/**
 * MongoDB-backed store. Transactions need a replica set (or Atlas); a
 * standalone mongod rejects `startTransaction`.
 */
export function createMongoStore(): Store {
  return {
    ...createRepositories(null),
    transaction<T>(fn: (tx: Repositories) => Promise<T>): Promise<T> {
      return mongoose.connection.transaction((session) => fn(createRepositories(session)));
    },
  };
}
