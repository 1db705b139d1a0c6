import mongoose, { Document, Schema } from 'mongoose';

import { TransactionStatus, TransactionType } from '../types/ledger';

export interface ITransaction extends Document {
  transactionId: string;
  type: TransactionType;
  amount: number;
  fromAccountId?: string;
  toAccountId?: string;
  status: TransactionStatus;
  description?: string;
  transferPairId?: string;
  cardId?: string;
  createdAt: Date;
}

const transactionSchema = new Schema<ITransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      enum: Object.values(TransactionType),
    },
    amount: {
      type: Number,
      required: true,
      min: 1,
      validate: Number.isInteger,
    },
    fromAccountId: {
      type: String,
    },
    toAccountId: {
      type: String,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(TransactionStatus),
    },
    description: {
      type: String,
      trim: true,
    },
    transferPairId: {
      type: String,
      index: true,
    },
    cardId: {
      type: String,
    },
    createdAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
  }
);

// Rows are append-only; every query is scoped to one party and ordered by time
transactionSchema.index({ fromAccountId: 1, createdAt: 1 });
transactionSchema.index({ toAccountId: 1, createdAt: 1 });
transactionSchema.index({ createdAt: -1 });

export const Transaction = mongoose.model<ITransaction>('Transaction', transactionSchema);
