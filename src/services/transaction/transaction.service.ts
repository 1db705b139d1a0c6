import { ApiError } from '../../middlewares/errorHandler';
import { LedgerStore } from '../../stores';
import {
  TransactionQuery,
  TransactionRecord,
  TransactionStatus,
  TransactionType,
} from '../../types/ledger';
import { AuthorizationResult, TransactionAuthorizer } from '../ledger';
import { AccountService } from '../account/account.service';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 200;

export const pageSize = (limit?: number): number =>
  Math.min(limit ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);

export interface CreateTransactionDTO {
  type: TransactionType;
  amount: number;
  description?: string | null;
  cardId?: string | null;
}

export interface TransactionFilters {
  status?: TransactionStatus;
  type?: TransactionType;
  limit?: number;
  offset?: number;
}

const toQuery = (filters: TransactionFilters): TransactionQuery => ({
  status: filters.status,
  type: filters.type,
  limit: pageSize(filters.limit),
  offset: filters.offset ?? 0,
  order: 'desc',
});

const touches = (row: TransactionRecord, accountId: string): boolean =>
  row.fromAccountId === accountId || row.toAccountId === accountId;

/**
 * Ownership checks and queries around the authorizer
 */
export class TransactionService {
  constructor(
    private readonly store: LedgerStore,
    private readonly authorizer: TransactionAuthorizer,
    private readonly accountService: AccountService
  ) {}

  async create(
    accountHolderId: string,
    accountId: string,
    dto: CreateTransactionDTO
  ): Promise<AuthorizationResult> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);
    return this.authorizer.authorize({ accountId, ...dto });
  }

  async list(
    accountHolderId: string,
    accountId: string,
    filters: TransactionFilters
  ): Promise<TransactionRecord[]> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);
    return this.store.listTransactions({ ...toQuery(filters), accountId });
  }

  async get(
    accountHolderId: string,
    accountId: string,
    transactionId: string
  ): Promise<TransactionRecord> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);
    const row = await this.store.findTransaction(transactionId);
    // A row outside this account is reported as missing, not forbidden
    if (!row || !touches(row, accountId)) {
      throw ApiError.notFound('transaction', transactionId);
    }
    return row;
  }

  async adminList(filters: TransactionFilters & { accountId?: string }): Promise<TransactionRecord[]> {
    return this.store.listTransactions({ ...toQuery(filters), accountId: filters.accountId });
  }

  async adminListForAccount(accountId: string, filters: TransactionFilters): Promise<TransactionRecord[]> {
    await this.accountService.adminGetAccount(accountId);
    return this.store.listTransactions({ ...toQuery(filters), accountId });
  }

  async adminGet(transactionId: string): Promise<TransactionRecord> {
    const row = await this.store.findTransaction(transactionId);
    if (!row) {
      throw ApiError.notFound('transaction', transactionId);
    }
    return row;
  }
}
