import { AccountService } from '../account/account.service';
import { TransferCoordinator, TransferResult } from '../ledger';

export interface TransferDTO {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  description?: string | null;
}

export class TransferService {
  constructor(
    private readonly coordinator: TransferCoordinator,
    private readonly accountService: AccountService
  ) {}

  /**
   * Transfer out of one of the holder's accounts. Ownership is checked here
   * for a clean 403/404 and again by the coordinator under the lock.
   */
  async transfer(accountHolderId: string, dto: TransferDTO): Promise<TransferResult> {
    if (dto.fromAccountId !== dto.toAccountId) {
      await this.accountService.getOwnedAccount(dto.fromAccountId, accountHolderId);
    }
    return this.coordinator.transfer({ ...dto, expectedSourceHolderId: accountHolderId });
  }
}
