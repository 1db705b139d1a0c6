import mongoose, { Document, Schema } from 'mongoose';

export interface ICard extends Document {
  cardId: string;
  accountId: string;
  cardNumberEncrypted: string;
  cardNumberLastFour: string;
  expirationMonth: number;
  expirationYear: number;
  cvvEncrypted: string;
  isActive: boolean;
  createdAt: Date;
}

const cardSchema = new Schema<ICard>(
  {
    cardId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    accountId: {
      type: String,
      required: true,
      unique: true,
    },
    cardNumberEncrypted: {
      type: String,
      required: true,
    },
    cardNumberLastFour: {
      type: String,
      required: true,
      match: /^\d{4}$/,
    },
    expirationMonth: {
      type: Number,
      required: true,
      min: 1,
      max: 12,
    },
    expirationYear: {
      type: Number,
      required: true,
    },
    cvvEncrypted: {
      type: String,
      required: true,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

export const Card = mongoose.model<ICard>('Card', cardSchema);
