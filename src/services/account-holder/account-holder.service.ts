import { ApiError } from '../../middlewares/errorHandler';
import { IdentityStore } from '../../stores';
import { AccountHolderRecord, AccountHolderUpdate } from '../../types/identity';

export class AccountHolderService {
  constructor(private readonly identity: IdentityStore) {}

  async getProfile(accountHolderId: string): Promise<AccountHolderRecord> {
    const holder = await this.identity.findAccountHolderById(accountHolderId);
    if (!holder) {
      throw ApiError.notFound('account holder', accountHolderId);
    }
    return holder;
  }

  async updateProfile(
    accountHolderId: string,
    update: AccountHolderUpdate
  ): Promise<AccountHolderRecord> {
    const holder = await this.identity.updateAccountHolder(accountHolderId, update);
    if (!holder) {
      throw ApiError.notFound('account holder', accountHolderId);
    }
    return holder;
  }
}
