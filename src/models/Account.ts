import mongoose, { Document, Schema } from 'mongoose';

import { AccountType } from '../types/ledger';

export interface IAccount extends Document {
  accountId: string;
  accountHolderId: string;
  accountType: AccountType;
  accountNumber: string;
  currency: string;
  isActive: boolean;
  cachedBalance: number;
  /** Bumped by every lock acquisition; the write conflict it causes is the row lock */
  lockVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

const accountSchema = new Schema<IAccount>(
  {
    accountId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    accountHolderId: {
      type: String,
      required: true,
      index: true,
    },
    accountType: {
      type: String,
      required: true,
      enum: Object.values(AccountType),
    },
    accountNumber: {
      type: String,
      required: true,
      unique: true,
    },
    currency: {
      type: String,
      required: true,
      default: 'USD',
      uppercase: true,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    cachedBalance: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
      validate: Number.isInteger,
    },
    lockVersion: {
      type: Number,
      required: true,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

export const Account = mongoose.model<IAccount>('Account', accountSchema);
