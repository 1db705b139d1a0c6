import mongoose, { Document, Schema } from 'mongoose';

import { UserType } from '../types/identity';

export interface IUser extends Document {
  userId: string;
  email: string;
  passwordHash: string;
  userType: UserType;
  isActive: boolean;
  lastLoginAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    userId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },
    passwordHash: {
      type: String,
      required: true,
    },
    userType: {
      type: String,
      required: true,
      enum: Object.values(UserType),
      default: UserType.MEMBER,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    lastLoginAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

export const User = mongoose.model<IUser>('User', userSchema);
