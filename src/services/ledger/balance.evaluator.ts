import { ApiError } from '../../middlewares/errorHandler';
import { LedgerReader, LedgerStore } from '../../stores';
import { TransactionRecord, TransactionStatus, TransactionType } from '../../types/ledger';

export interface IntegrityReport {
  accountId: string;
  cachedBalance: number;
  computedBalance: number;
  match: boolean;
  currency: string;
}

/**
 * Signed sum of the approved rows that touch accountId. Declined rows add 0.
 */
export const foldBalance = (accountId: string, rows: readonly TransactionRecord[]): number =>
  rows.reduce((balance, row) => {
    if (row.status !== TransactionStatus.APPROVED) {
      return balance;
    }
    if (row.type === TransactionType.CREDIT && row.toAccountId === accountId) {
      return balance + row.amount;
    }
    if (row.type === TransactionType.DEBIT && row.fromAccountId === accountId) {
      return balance - row.amount;
    }
    return balance;
  }, 0);

export class BalanceEvaluator {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Balance from the transaction log. Pass the unit of work as reader when the
   * result must be consistent with that unit's locks and writes.
   */
  async computeBalance(accountId: string, reader: LedgerReader = this.store): Promise<number> {
    const rows = await reader.listTransactions({
      accountId,
      status: TransactionStatus.APPROVED,
    });
    return foldBalance(accountId, rows);
  }

  async computeBalanceBefore(
    accountId: string,
    instant: Date,
    reader: LedgerReader = this.store
  ): Promise<number> {
    const rows = await reader.listTransactions({
      accountId,
      status: TransactionStatus.APPROVED,
      createdBefore: instant,
    });
    return foldBalance(accountId, rows);
  }

  async checkIntegrity(accountId: string): Promise<IntegrityReport> {
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('account', accountId);
    }
    const computedBalance = await this.computeBalance(accountId);
    return {
      accountId,
      cachedBalance: account.cachedBalance,
      computedBalance,
      match: account.cachedBalance === computedBalance,
      currency: account.currency,
    };
  }
}
