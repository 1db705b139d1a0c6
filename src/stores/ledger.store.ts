import {
  AccountDraft,
  AccountQuery,
  AccountRecord,
  CardDraft,
  CardRecord,
  TransactionDraft,
  TransactionQuery,
  TransactionRecord,
} from '../types/ledger';

/**
 * Read access to committed ledger state (or, inside a unit of work, to that
 * unit's view including its own uncommitted writes)
 */
export interface LedgerReader {
  findAccount(accountId: string): Promise<AccountRecord | null>;
  findAccountByNumber(accountNumber: string): Promise<AccountRecord | null>;
  listAccounts(query?: AccountQuery): Promise<AccountRecord[]>;
  findTransaction(transactionId: string): Promise<TransactionRecord | null>;
  listTransactions(query: TransactionQuery): Promise<TransactionRecord[]>;
  findCard(cardId: string): Promise<CardRecord | null>;
  findCardByAccount(accountId: string): Promise<CardRecord | null>;
}

/**
 * A bounded sequence of store operations that commits or rolls back as a whole.
 *
 * Writes to an account's cached balance require that account's exclusive lock,
 * taken with lockAccount and held until the unit ends.
 */
export interface UnitOfWork extends LedgerReader {
  /**
   * Take the exclusive lock on an account row and return its current state,
   * or null when the account does not exist. Re-locking a held account is a no-op.
   * Throws LockTimeoutError when the lock cannot be taken in time.
   */
  lockAccount(accountId: string): Promise<AccountRecord | null>;
  insertTransaction(draft: TransactionDraft): Promise<TransactionRecord>;
  setCachedBalance(accountId: string, cachedBalance: number): Promise<void>;
  insertAccount(draft: AccountDraft): Promise<AccountRecord>;
  insertCard(draft: CardDraft): Promise<CardRecord>;
}

export type UnitOfWorkFn<T> = (uow: UnitOfWork) => Promise<T>;

export interface LedgerStore extends LedgerReader {
  /**
   * Run work inside a unit of work. A resolved promise commits everything the
   * work wrote; a rejection rolls all of it back and rethrows. The work may be
   * re-run from the start when the backing database asks for a retry, so it must
   * not have side effects outside the unit of work.
   */
  runUnitOfWork<T>(work: UnitOfWorkFn<T>): Promise<T>;
  isReady(): boolean;
}
