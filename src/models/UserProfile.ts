import mongoose, { Schema, Document, Types } from 'mongoose';
import { DEFAULT_COUNTRY } from '../utils/constants.js';

export interface IUserProfile extends Document {
  _id: Types.ObjectId;
  userId: Types.ObjectId;
  firstName: string;
  lastName: string;
  addressLine1: string;
  addressLine2?: string | null;
  city: string;
  state: string;
  postalCode: string;
  country: string;
  dateOfBirth?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const userProfileSchema = new Schema<IUserProfile>(
  {
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, unique: true },
    firstName: { type: String, required: true, trim: true, maxlength: 50 },
    lastName: { type: String, required: true, trim: true, maxlength: 50 },
    addressLine1: { type: String, required: true, trim: true, maxlength: 255 },
    addressLine2: { type: String, trim: true, maxlength: 255, default: null },
    city: { type: String, required: true, trim: true, maxlength: 100 },
    state: { type: String, required: true, trim: true, maxlength: 100 },
    postalCode: { type: String, required: true, trim: true, maxlength: 20 },
    country: { type: String, trim: true, maxlength: 100, default: DEFAULT_COUNTRY },
    dateOfBirth: { type: Date, default: null },
  },
  { timestamps: true },
);

export const UserProfile = mongoose.model<IUserProfile>('UserProfile', userProfileSchema);
