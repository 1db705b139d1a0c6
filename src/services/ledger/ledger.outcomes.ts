import { TransactionRecord } from '../../types/ledger';

export type DeclineReason = 'insufficient_funds';

export interface Approved {
  outcome: 'approved';
  transaction: TransactionRecord;
  /** Computed balance after the row was applied */
  balance: number;
}

export interface Declined {
  outcome: 'declined';
  reason: DeclineReason;
  transaction: TransactionRecord;
  /** Computed balance, unchanged by the declined row */
  balance: number;
}

export type AuthorizationResult = Approved | Declined;

interface TransferLegs {
  amount: number;
  fromAccountId: string;
  toAccountId: string;
}

export interface TransferApproved extends TransferLegs {
  outcome: 'approved';
  transferPairId: string;
  debitTransaction: TransactionRecord;
  creditTransaction: TransactionRecord;
}

export interface TransferDeclined extends TransferLegs {
  outcome: 'declined';
  reason: DeclineReason;
  debitTransaction: TransactionRecord;
}

export type TransferResult = TransferApproved | TransferDeclined;
