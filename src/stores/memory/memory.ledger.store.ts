import { v4 as uuid } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import {
  AccountDraft,
  AccountQuery,
  AccountRecord,
  CardDraft,
  CardRecord,
  TransactionDraft,
  TransactionQuery,
  TransactionRecord,
} from '../../types/ledger';
import { LedgerReader, LedgerStore, UnitOfWork, UnitOfWorkFn } from '../ledger.store';
import { LockManager } from './lock.manager';

export interface MemoryLedgerStoreOptions {
  lockTimeoutMs?: number;
  clock?: () => Date;
  generateId?: () => string;
}

interface LedgerTables {
  accounts: Map<string, AccountRecord>;
  transactions: TransactionRecord[];
  cards: Map<string, CardRecord>;
}

const emptyTables = (): LedgerTables => ({
  accounts: new Map(),
  transactions: [],
  cards: new Map(),
});

const touches = (row: TransactionRecord, accountId: string): boolean =>
  row.fromAccountId === accountId || row.toAccountId === accountId;

export const matchesTransactionQuery = (row: TransactionRecord, query: TransactionQuery): boolean => {
  if (query.accountId !== undefined && !touches(row, query.accountId)) return false;
  if (query.status !== undefined && row.status !== query.status) return false;
  if (query.type !== undefined && row.type !== query.type) return false;
  if (query.transferPairId !== undefined && row.transferPairId !== query.transferPairId) return false;
  if (query.createdFrom && row.createdAt.getTime() < query.createdFrom.getTime()) return false;
  if (query.createdBefore && row.createdAt.getTime() >= query.createdBefore.getTime()) return false;
  return true;
};

/**
 * Read view over committed tables plus, inside a unit of work, its staged writes.
 * Every record handed out is a copy.
 */
class TableView implements LedgerReader {
  constructor(
    protected readonly committed: LedgerTables,
    protected readonly staged: LedgerTables = emptyTables()
  ) {}

  protected account(accountId: string): AccountRecord | undefined {
    return this.staged.accounts.get(accountId) ?? this.committed.accounts.get(accountId);
  }

  protected allAccounts(): AccountRecord[] {
    const merged = new Map(this.committed.accounts);
    for (const [id, account] of this.staged.accounts) {
      merged.set(id, account);
    }
    return [...merged.values()];
  }

  protected allTransactions(): TransactionRecord[] {
    return [...this.committed.transactions, ...this.staged.transactions];
  }

  protected allCards(): CardRecord[] {
    return [...this.committed.cards.values(), ...this.staged.cards.values()];
  }

  async findAccount(accountId: string): Promise<AccountRecord | null> {
    const account = this.account(accountId);
    return account ? { ...account } : null;
  }

  async findAccountByNumber(accountNumber: string): Promise<AccountRecord | null> {
    const account = this.allAccounts().find((a) => a.accountNumber === accountNumber);
    return account ? { ...account } : null;
  }

  async listAccounts(query: AccountQuery = {}): Promise<AccountRecord[]> {
    return this.allAccounts()
      .filter((a) => query.accountHolderId === undefined || a.accountHolderId === query.accountHolderId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((a) => ({ ...a }));
  }

  async findTransaction(transactionId: string): Promise<TransactionRecord | null> {
    const row = this.allTransactions().find((t) => t.id === transactionId);
    return row ? { ...row } : null;
  }

  async listTransactions(query: TransactionQuery): Promise<TransactionRecord[]> {
    const direction = query.order === 'desc' ? -1 : 1;
    // Insertion order breaks createdAt ties, matching the log's append order
    const indexed = this.allTransactions()
      .map((row, index) => ({ row, index }))
      .filter(({ row }) => matchesTransactionQuery(row, query))
      .sort(
        (a, b) =>
          direction *
          (a.row.createdAt.getTime() - b.row.createdAt.getTime() || a.index - b.index)
      );

    const offset = query.offset ?? 0;
    const end = query.limit === undefined ? undefined : offset + query.limit;
    return indexed.slice(offset, end).map(({ row }) => ({ ...row }));
  }

  async findCard(cardId: string): Promise<CardRecord | null> {
    const card = this.allCards().find((c) => c.id === cardId);
    return card ? { ...card } : null;
  }

  async findCardByAccount(accountId: string): Promise<CardRecord | null> {
    const card = this.allCards().find((c) => c.accountId === accountId);
    return card ? { ...card } : null;
  }
}

const constraintViolation = (message: string): ApiError =>
  new ApiError(ErrorCode.INTERNAL_ERROR, `Constraint violation: ${message}`, {
    isOperational: false,
  });

class MemoryUnitOfWork extends TableView implements UnitOfWork {
  readonly owner = Symbol('unit-of-work');
  private readonly held = new Set<string>();

  constructor(
    committed: LedgerTables,
    private readonly locks: LockManager,
    private readonly clock: () => Date,
    private readonly generateId: () => string
  ) {
    super(committed, emptyTables());
  }

  async lockAccount(accountId: string): Promise<AccountRecord | null> {
    if (!this.held.has(accountId)) {
      await this.locks.acquire(accountId, this.owner);
      this.held.add(accountId);
    }
    return this.findAccount(accountId);
  }

  async insertTransaction(draft: TransactionDraft): Promise<TransactionRecord> {
    if (!Number.isSafeInteger(draft.amount) || draft.amount <= 0) {
      throw constraintViolation(`transaction amount must be a positive integer, got ${draft.amount}`);
    }
    const row: TransactionRecord = { ...draft, id: this.generateId(), createdAt: this.clock() };
    this.staged.transactions.push(row);
    return { ...row };
  }

  async setCachedBalance(accountId: string, cachedBalance: number): Promise<void> {
    if (!this.held.has(accountId)) {
      throw constraintViolation(`cached balance of ${accountId} written without its lock`);
    }
    if (!Number.isSafeInteger(cachedBalance) || cachedBalance < 0) {
      throw constraintViolation(`cached balance must be a non-negative integer, got ${cachedBalance}`);
    }
    const account = this.account(accountId);
    if (!account) {
      throw constraintViolation(`account ${accountId} does not exist`);
    }
    this.staged.accounts.set(accountId, { ...account, cachedBalance, updatedAt: this.clock() });
  }

  async insertAccount(draft: AccountDraft): Promise<AccountRecord> {
    if (this.allAccounts().some((a) => a.accountNumber === draft.accountNumber)) {
      throw ApiError.duplicateAccountNumber(draft.accountNumber);
    }
    const now = this.clock();
    const account: AccountRecord = {
      ...draft,
      id: this.generateId(),
      isActive: true,
      cachedBalance: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.staged.accounts.set(account.id, account);
    return { ...account };
  }

  async insertCard(draft: CardDraft): Promise<CardRecord> {
    if (this.allCards().some((c) => c.accountId === draft.accountId)) {
      throw ApiError.duplicateCard(draft.accountId);
    }
    const card: CardRecord = { ...draft, id: this.generateId(), isActive: true, createdAt: this.clock() };
    this.staged.cards.set(card.id, card);
    return { ...card };
  }

  commit(): void {
    for (const [id, account] of this.staged.accounts) {
      this.committed.accounts.set(id, account);
    }
    this.committed.transactions.push(...this.staged.transactions);
    for (const [id, card] of this.staged.cards) {
      this.committed.cards.set(id, card);
    }
  }

  releaseAll(): void {
    for (const accountId of this.held) {
      this.locks.release(accountId, this.owner);
    }
    this.held.clear();
  }
}

/**
 * In-process ledger store. Writes made inside a unit of work are staged and
 * applied in one synchronous step on commit; a failing unit leaves no trace.
 */
export class MemoryLedgerStore extends TableView implements LedgerStore {
  private readonly locks: LockManager;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryLedgerStoreOptions = {}) {
    super(emptyTables());
    this.locks = new LockManager(options.lockTimeoutMs ?? 5000);
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => uuid());
  }

  async runUnitOfWork<T>(work: UnitOfWorkFn<T>): Promise<T> {
    const uow = new MemoryUnitOfWork(this.committed, this.locks, this.clock, this.generateId);
    try {
      const result = await work(uow);
      uow.commit();
      return result;
    } finally {
      uow.releaseAll();
    }
  }

  isReady(): boolean {
    return true;
  }
}
