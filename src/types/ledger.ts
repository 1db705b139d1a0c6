/**
 * Ledger domain types shared by the stores, the ledger engine and the HTTP layer.
 * All monetary values are integers in minor currency units (cents).
 */

export enum TransactionType {
  CREDIT = 'credit',
  DEBIT = 'debit',
}

export enum TransactionStatus {
  APPROVED = 'approved',
  DECLINED = 'declined',
}

export enum AccountType {
  CHECKING = 'checking',
  SAVINGS = 'savings',
}

export interface AccountRecord {
  id: string;
  accountHolderId: string;
  accountType: AccountType;
  accountNumber: string;
  currency: string;
  isActive: boolean;
  /** Advisory copy of the computed balance; the transaction log is authoritative */
  cachedBalance: number;
  createdAt: Date;
  updatedAt: Date;
}

export type AccountDraft = Pick<
  AccountRecord,
  'accountHolderId' | 'accountType' | 'accountNumber' | 'currency'
>;

/**
 * One immutable ledger row. A debit carries only fromAccountId, a credit only toAccountId.
 */
export interface TransactionRecord {
  id: string;
  type: TransactionType;
  amount: number;
  fromAccountId: string | null;
  toAccountId: string | null;
  status: TransactionStatus;
  description: string | null;
  transferPairId: string | null;
  cardId: string | null;
  createdAt: Date;
}

export type TransactionDraft = Omit<TransactionRecord, 'id' | 'createdAt'>;

export interface CardRecord {
  id: string;
  accountId: string;
  cardNumberEncrypted: string;
  cardNumberLastFour: string;
  expirationMonth: number;
  expirationYear: number;
  cvvEncrypted: string;
  isActive: boolean;
  createdAt: Date;
}

export type CardDraft = Omit<CardRecord, 'id' | 'createdAt' | 'isActive'>;

export interface TransactionQuery {
  /** Rows where the account is either party */
  accountId?: string;
  status?: TransactionStatus;
  type?: TransactionType;
  transferPairId?: string;
  /** Inclusive lower bound on createdAt */
  createdFrom?: Date;
  /** Exclusive upper bound on createdAt */
  createdBefore?: Date;
  order?: 'asc' | 'desc';
  limit?: number;
  offset?: number;
}

export interface AccountQuery {
  accountHolderId?: string;
}
