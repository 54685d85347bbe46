import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IOtp extends Document {
  _id: Types.ObjectId;
  userId: Types.ObjectId;
  code: string;
  isUsed: boolean;
  attempts: number;
  maxAttempts: number;
  expiresAt: Date;
  createdAt: Date;
}

const otpSchema = new Schema<IOtp>(
  {
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    code: { type: String, required: true, match: /^\d+$/ },
    isUsed: { type: Boolean, default: false },
    attempts: { type: Number, default: 0, min: 0 },
    maxAttempts: { type: Number, default: 3, min: 1 },
    expiresAt: { type: Date, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

otpSchema.index({ userId: 1, code: 1, isUsed: 1, createdAt: -1 });
otpSchema.index({ userId: 1, createdAt: -1 });
otpSchema.index({ expiresAt: 1 });

export const Otp = mongoose.model<IOtp>('Otp', otpSchema);
