import { ApiError } from '../../middlewares/errorHandler';
import { LedgerStore } from '../../stores';
import { TransactionRecord, TransactionStatus, TransactionType } from '../../types/ledger';

import { BalanceEvaluator } from './balance.evaluator';

export const MIN_STATEMENT_YEAR = 2000;
export const MAX_STATEMENT_YEAR = 2100;

export interface StatementView {
  accountId: string;
  year: number;
  month: number;
  openingBalance: number;
  closingBalance: number;
  totalCredits: number;
  totalDebits: number;
  transactionCount: number;
  /** Approved and declined rows of the period, oldest first */
  transactions: TransactionRecord[];
}

export interface StatementPeriod {
  start: Date;
  end: Date;
}

/**
 * [start, end) of a calendar month in UTC. Rejects anything that is not a
 * whole month between MIN_STATEMENT_YEAR and MAX_STATEMENT_YEAR.
 */
export const statementPeriod = (year: unknown, month: unknown): StatementPeriod => {
  if (year === undefined || year === null || month === undefined || month === null) {
    throw ApiError.invalidPeriod('Both year and month are required');
  }
  if (typeof year !== 'number' || !Number.isInteger(year)) {
    throw ApiError.invalidPeriod('Year must be an integer');
  }
  if (typeof month !== 'number' || !Number.isInteger(month)) {
    throw ApiError.invalidPeriod('Month must be an integer');
  }
  if (month < 1 || month > 12) {
    throw ApiError.invalidPeriod('Month must be between 1 and 12');
  }
  if (year < MIN_STATEMENT_YEAR || year > MAX_STATEMENT_YEAR) {
    throw ApiError.invalidPeriod(
      `Year must be between ${MIN_STATEMENT_YEAR} and ${MAX_STATEMENT_YEAR}`
    );
  }
  return {
    start: new Date(Date.UTC(year, month - 1, 1)),
    end: new Date(Date.UTC(year, month, 1)),
  };
};

export class StatementAggregator {
  constructor(
    private readonly store: LedgerStore,
    private readonly evaluator: BalanceEvaluator
  ) {}

  async statement(accountId: string, year: unknown, month: unknown): Promise<StatementView> {
    const period = statementPeriod(year, month);
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('account', accountId);
    }

    const openingBalance = await this.evaluator.computeBalanceBefore(accountId, period.start);
    const transactions = await this.store.listTransactions({
      accountId,
      createdFrom: period.start,
      createdBefore: period.end,
      order: 'asc',
    });

    let totalCredits = 0;
    let totalDebits = 0;
    for (const row of transactions) {
      if (row.status !== TransactionStatus.APPROVED) {
        continue;
      }
      if (row.type === TransactionType.CREDIT && row.toAccountId === accountId) {
        totalCredits += row.amount;
      } else if (row.type === TransactionType.DEBIT && row.fromAccountId === accountId) {
        totalDebits += row.amount;
      }
    }

    return {
      accountId,
      year: period.start.getUTCFullYear(),
      month: period.start.getUTCMonth() + 1,
      openingBalance,
      closingBalance: openingBalance + totalCredits - totalDebits,
      totalCredits,
      totalDebits,
      transactionCount: transactions.length,
      transactions,
    };
  }
}
