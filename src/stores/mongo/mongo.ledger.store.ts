import mongoose, { ClientSession, FilterQuery } from 'mongoose';
import { v4 as uuid } from 'uuid';

import { ApiError, LockTimeoutError } from '../../middlewares/errorHandler';
import { Account, Card, IAccount, ICard, ITransaction, Transaction } from '../../models';
import { createServiceLogger, ledgerLockTimeoutsTotal, ledgerLockWait } from '../../observability';
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

const log = createServiceLogger('mongo-ledger-store');

const MAX_BACKOFF_MS = 200;

export interface MongoLedgerStoreOptions {
  lockTimeoutMs: number;
}

const toAccount = (doc: IAccount): AccountRecord => ({
  id: doc.accountId,
  accountHolderId: doc.accountHolderId,
  accountType: doc.accountType,
  accountNumber: doc.accountNumber,
  currency: doc.currency,
  isActive: doc.isActive,
  cachedBalance: doc.cachedBalance,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toTransaction = (doc: ITransaction): TransactionRecord => ({
  id: doc.transactionId,
  type: doc.type,
  amount: doc.amount,
  fromAccountId: doc.fromAccountId ?? null,
  toAccountId: doc.toAccountId ?? null,
  status: doc.status,
  description: doc.description ?? null,
  transferPairId: doc.transferPairId ?? null,
  cardId: doc.cardId ?? null,
  createdAt: doc.createdAt,
});

const toCard = (doc: ICard): CardRecord => ({
  id: doc.cardId,
  accountId: doc.accountId,
  cardNumberEncrypted: doc.cardNumberEncrypted,
  cardNumberLastFour: doc.cardNumberLastFour,
  expirationMonth: doc.expirationMonth,
  expirationYear: doc.expirationYear,
  cvvEncrypted: doc.cvvEncrypted,
  isActive: doc.isActive,
  createdAt: doc.createdAt,
});

const hasLabel = (err: unknown, label: string): boolean =>
  err instanceof mongoose.mongo.MongoError && err.hasErrorLabel(label);

const isDuplicateKey = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const backoffMs = (attempt: number): number =>
  Math.min(MAX_BACKOFF_MS, 5 * 2 ** attempt) * (0.5 + Math.random() / 2);

/**
 * Commit, re-sending the commit while its result is unknown (commitTransaction
 * is idempotent). Gives up with a retryable database error at the deadline.
 */
export const commitWithin = async (
  session: Pick<ClientSession, 'commitTransaction'>,
  deadline: number
): Promise<void> => {
  for (let attempt = 1; ; attempt++) {
    try {
      await session.commitTransaction();
      return;
    } catch (err) {
      if (!hasLabel(err, 'UnknownTransactionCommitResult')) {
        throw err;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        log.error({ err, attempt }, 'Commit result still unknown at the deadline');
        throw ApiError.database();
      }
      log.warn({ attempt }, 'Commit result unknown, retrying commit');
      await sleep(Math.min(backoffMs(attempt), remaining));
    }
  }
};

class MongoReader implements LedgerReader {
  constructor(protected readonly session: ClientSession | null = null) {}

  async findAccount(accountId: string): Promise<AccountRecord | null> {
    const doc = await Account.findOne({ accountId }).session(this.session);
    return doc ? toAccount(doc) : null;
  }

  async findAccountByNumber(accountNumber: string): Promise<AccountRecord | null> {
    const doc = await Account.findOne({ accountNumber }).session(this.session);
    return doc ? toAccount(doc) : null;
  }

  async listAccounts(query: AccountQuery = {}): Promise<AccountRecord[]> {
    const filter: FilterQuery<IAccount> = {};
    if (query.accountHolderId !== undefined) {
      filter.accountHolderId = query.accountHolderId;
    }
    const docs = await Account.find(filter).sort({ createdAt: 1, _id: 1 }).session(this.session);
    return docs.map(toAccount);
  }

  async findTransaction(transactionId: string): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOne({ transactionId }).session(this.session);
    return doc ? toTransaction(doc) : null;
  }

  async listTransactions(query: TransactionQuery): Promise<TransactionRecord[]> {
    const filter: FilterQuery<ITransaction> = {};
    if (query.accountId !== undefined) {
      filter.$or = [{ fromAccountId: query.accountId }, { toAccountId: query.accountId }];
    }
    if (query.status !== undefined) filter.status = query.status;
    if (query.type !== undefined) filter.type = query.type;
    if (query.transferPairId !== undefined) filter.transferPairId = query.transferPairId;

    const createdAt: { $gte?: Date; $lt?: Date } = {};
    if (query.createdFrom) createdAt.$gte = query.createdFrom;
    if (query.createdBefore) createdAt.$lt = query.createdBefore;
    if (createdAt.$gte || createdAt.$lt) {
      filter.createdAt = createdAt;
    }

    const direction = query.order === 'desc' ? -1 : 1;
    let find = Transaction.find(filter)
      .sort({ createdAt: direction, _id: direction })
      .skip(query.offset ?? 0)
      .session(this.session);
    if (query.limit !== undefined) {
      find = find.limit(query.limit);
    }
    const docs = await find;
    return docs.map(toTransaction);
  }

  async findCard(cardId: string): Promise<CardRecord | null> {
    const doc = await Card.findOne({ cardId }).session(this.session);
    return doc ? toCard(doc) : null;
  }

  async findCardByAccount(accountId: string): Promise<CardRecord | null> {
    const doc = await Card.findOne({ accountId }).session(this.session);
    return doc ? toCard(doc) : null;
  }
}

/**
 * Unit of work bound to one multi-document transaction. Locking an account
 * writes to its document, so a second transaction locking the same account
 * hits a write conflict and is retried by the store.
 */
class MongoUnitOfWork extends MongoReader implements UnitOfWork {
  private readonly held = new Set<string>();
  pendingLock: string | null = null;

  constructor(private readonly txSession: ClientSession) {
    super(txSession);
  }

  async lockAccount(accountId: string): Promise<AccountRecord | null> {
    if (this.held.has(accountId)) {
      return this.findAccount(accountId);
    }
    this.pendingLock = accountId;
    const doc = await Account.findOneAndUpdate(
      { accountId },
      { $inc: { lockVersion: 1 } },
      { new: true, session: this.txSession }
    );
    this.pendingLock = null;
    if (!doc) {
      return null;
    }
    this.held.add(accountId);
    return toAccount(doc);
  }

  async insertTransaction(draft: TransactionDraft): Promise<TransactionRecord> {
    const doc = new Transaction({
      transactionId: uuid(),
      type: draft.type,
      amount: draft.amount,
      fromAccountId: draft.fromAccountId ?? undefined,
      toAccountId: draft.toAccountId ?? undefined,
      status: draft.status,
      description: draft.description ?? undefined,
      transferPairId: draft.transferPairId ?? undefined,
      cardId: draft.cardId ?? undefined,
      createdAt: new Date(),
    });
    await doc.save({ session: this.txSession });
    return toTransaction(doc);
  }

  async setCachedBalance(accountId: string, cachedBalance: number): Promise<void> {
    if (!this.held.has(accountId)) {
      throw ApiError.internal(`Cached balance of ${accountId} written without its lock`);
    }
    await Account.updateOne(
      { accountId },
      { $set: { cachedBalance } },
      { session: this.txSession, runValidators: true }
    );
  }

  async insertAccount(draft: AccountDraft): Promise<AccountRecord> {
    const doc = new Account({ ...draft, accountId: uuid() });
    try {
      await doc.save({ session: this.txSession });
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw ApiError.duplicateAccountNumber(draft.accountNumber);
      }
      throw err;
    }
    return toAccount(doc);
  }

  async insertCard(draft: CardDraft): Promise<CardRecord> {
    const doc = new Card({ ...draft, cardId: uuid() });
    try {
      await doc.save({ session: this.txSession });
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw ApiError.duplicateCard(draft.accountId);
      }
      throw err;
    }
    return toCard(doc);
  }
}

/**
 * Ledger store on MongoDB multi-document transactions (replica set required).
 *
 * Lock contention surfaces as TransientTransactionError; the whole unit is
 * re-run with jittered backoff until lockTimeoutMs has passed, then fails with
 * LockTimeoutError.
 */
export class MongoLedgerStore extends MongoReader implements LedgerStore {
  constructor(private readonly options: MongoLedgerStoreOptions) {
    super(null);
  }

  async runUnitOfWork<T>(work: UnitOfWorkFn<T>): Promise<T> {
    const startedAt = Date.now();
    const deadline = startedAt + this.options.lockTimeoutMs;

    for (let attempt = 1; ; attempt++) {
      const attemptStartedAt = Date.now();
      const session = await mongoose.startSession();
      const uow = new MongoUnitOfWork(session);
      try {
        session.startTransaction({
          readConcern: { level: 'snapshot' },
          writeConcern: { w: 'majority' },
          readPreference: 'primary',
        });
        const result = await work(uow);
        await commitWithin(session, deadline);
        ledgerLockWait.observe((attemptStartedAt - startedAt) / 1000);
        return result;
      } catch (err) {
        if (session.inTransaction()) {
          await session.abortTransaction();
        }
        if (!hasLabel(err, 'TransientTransactionError')) {
          if (err instanceof mongoose.mongo.MongoError) {
            log.error({ err, attempt }, 'Unit of work failed in the database');
            throw ApiError.database();
          }
          throw err;
        }
        if (Date.now() >= deadline) {
          ledgerLockTimeoutsTotal.inc();
          throw new LockTimeoutError(uow.pendingLock ?? 'ledger', this.options.lockTimeoutMs);
        }
        log.debug({ attempt, contended: uow.pendingLock }, 'Unit of work conflicted, retrying');
        await sleep(backoffMs(attempt));
      } finally {
        await session.endSession();
      }
    }
  }

  isReady(): boolean {
    return mongoose.connection.readyState === 1;
  }
}
