import { ApiError } from '../../middlewares/errorHandler';
import { TransactionType } from '../../types/ledger';

const TRANSACTION_TYPES: readonly string[] = Object.values(TransactionType);

export const assertPositiveAmount = (amount: number): void => {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw ApiError.invalidAmount();
  }
};

export const assertTransactionType = (type: string): void => {
  if (!TRANSACTION_TYPES.includes(type)) {
    throw ApiError.validationError(`Unknown transaction type: ${type}`, {
      type: [`Type must be one of: ${TRANSACTION_TYPES.join(', ')}`],
    });
  }
};

/**
 * Balances stay exact integers of cents. Checked under the lock, before any row is written.
 */
export const assertCreditFits = (balance: number, amount: number): void => {
  if (!Number.isSafeInteger(balance + amount)) {
    throw ApiError.invalidAmount('Amount would take the balance beyond the largest supported value');
  }
};
