import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IUser extends Document {
  _id: Types.ObjectId;
  mobile?: string | null;
  email?: string | null;
  password: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    mobile: {
      type: String,
      trim: true,
      default: null,
      match: [/^\+?1?\d{9,15}$/, 'Mobile number must be entered in the format: +999999999. Up to 15 digits allowed.'],
    },
    email: {
      type: String,
      lowercase: true,
      trim: true,
      default: null,
    },
    password: { type: String, required: true, select: false },
    firstName: { type: String, trim: true, default: '' },
    lastName: { type: String, trim: true, default: '' },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true },
);

// Unique only among users that actually carry the identifier
userSchema.index(
  { mobile: 1 },
  { unique: true, partialFilterExpression: { mobile: { $type: 'string' } } },
);
userSchema.index(
  { email: 1 },
  { unique: true, partialFilterExpression: { email: { $type: 'string' } } },
);

// At least one identifier is required
userSchema.pre('validate', function (next) {
  if (!this.mobile && !this.email) {
    this.invalidate('mobile', 'Either mobile number or email must be provided.');
  }
  next();
});

export const User = mongoose.model<IUser>('User', userSchema);
