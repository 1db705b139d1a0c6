import mongoose, { Document, Schema } from 'mongoose';

export interface IAccountHolder extends Document {
  accountHolderId: string;
  userId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone?: string;
  createdAt: Date;
  updatedAt: Date;
}

const accountHolderSchema = new Schema<IAccountHolder>(
  {
    accountHolderId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      unique: true,
    },
    firstName: {
      type: String,
      required: true,
      trim: true,
    },
    lastName: {
      type: String,
      required: true,
      trim: true,
    },
    email: {
      type: String,
      required: true,
      lowercase: true,
      trim: true,
    },
    phone: {
      type: String,
      trim: true,
    },
  },
  {
    timestamps: true,
  }
);

export const AccountHolder = mongoose.model<IAccountHolder>('AccountHolder', accountHolderSchema);
