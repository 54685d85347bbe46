import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IUserSession extends Document {
  _id: Types.ObjectId;
  userId: Types.ObjectId;
  sessionKey: string;
  ipAddress?: string | null;
  userAgent: string;
  isActive: boolean;
  createdAt: Date;
  lastActivity: Date;
}

const userSessionSchema = new Schema<IUserSession>(
  {
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    sessionKey: { type: String, required: true, unique: true },
    ipAddress: { type: String, default: null },
    userAgent: { type: String, default: '' },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: { createdAt: true, updatedAt: 'lastActivity' } },
);

userSessionSchema.index({ userId: 1, isActive: 1 });

export const UserSession = mongoose.model<IUserSession>('UserSession', userSessionSchema);
