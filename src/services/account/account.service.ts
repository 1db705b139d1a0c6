import { randomInt } from 'crypto';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { LedgerStore } from '../../stores';
import { ErrorCode } from '../../types/errors';
import { AccountRecord, AccountType } from '../../types/ledger';
import { BalanceEvaluator, IntegrityReport } from '../ledger';

const log = createServiceLogger('account');

const ACCOUNT_NUMBER_LENGTH = 10;
const ACCOUNT_NUMBER_ATTEMPTS = 10;

export const generateAccountNumber = (): string =>
  Array.from({ length: ACCOUNT_NUMBER_LENGTH }, () => randomInt(0, 10)).join('');

export interface AccountLookup {
  id: string;
  accountNumber: string;
  accountType: AccountType;
}

/**
 * Account reads and creation. Member-facing methods are scoped to one holder;
 * the admin* methods are not and must only be mounted behind requireRole.
 */
export class AccountService {
  constructor(
    private readonly store: LedgerStore,
    private readonly evaluator: BalanceEvaluator,
    private readonly currency: string
  ) {}

  async openAccount(accountHolderId: string, accountType: AccountType): Promise<AccountRecord> {
    for (let attempt = 0; attempt < ACCOUNT_NUMBER_ATTEMPTS; attempt++) {
      const accountNumber = generateAccountNumber();
      if (await this.store.findAccountByNumber(accountNumber)) {
        continue;
      }
      let account: AccountRecord;
      try {
        account = await this.store.runUnitOfWork((uow) =>
          uow.insertAccount({ accountHolderId, accountType, accountNumber, currency: this.currency })
        );
      } catch (err) {
        // Taken between the lookup and the insert
        if (err instanceof ApiError && err.errorCode === ErrorCode.DUPLICATE_ACCOUNT_NUMBER) {
          log.debug({ attempt }, 'Account number taken, drawing another');
          continue;
        }
        throw err;
      }
      log.info({ accountId: account.id, accountHolderId, accountType }, 'Account opened');
      return account;
    }
    throw ApiError.internal('Failed to generate a unique account number');
  }

  async listAccounts(accountHolderId: string): Promise<AccountRecord[]> {
    return this.store.listAccounts({ accountHolderId });
  }

  /**
   * The account, if it exists and belongs to the holder
   */
  async getOwnedAccount(accountId: string, accountHolderId: string): Promise<AccountRecord> {
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('account', accountId);
    }
    if (account.accountHolderId !== accountHolderId) {
      throw ApiError.forbidden('You do not have access to this account');
    }
    return account;
  }

  async getBalance(accountId: string, accountHolderId: string): Promise<IntegrityReport> {
    await this.getOwnedAccount(accountId, accountHolderId);
    return this.evaluator.checkIntegrity(accountId);
  }

  /**
   * Resolve an account number for a transfer. Exposes no balance or owner.
   */
  async lookupByNumber(accountNumber: string): Promise<AccountLookup> {
    const account = await this.store.findAccountByNumber(accountNumber);
    if (!account) {
      throw ApiError.notFound('account', accountNumber);
    }
    return {
      id: account.id,
      accountNumber: account.accountNumber,
      accountType: account.accountType,
    };
  }

  async adminListAccounts(): Promise<AccountRecord[]> {
    return this.store.listAccounts();
  }

  async adminGetAccount(accountId: string): Promise<AccountRecord> {
    const account = await this.store.findAccount(accountId);
    if (!account) {
      throw ApiError.notFound('account', accountId);
    }
    return account;
  }

  async adminGetBalance(accountId: string): Promise<IntegrityReport> {
    return this.evaluator.checkIntegrity(accountId);
  }
}
