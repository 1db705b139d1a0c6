import { AccountService } from '../account/account.service';
import { StatementAggregator, StatementView } from '../ledger';

export class StatementService {
  constructor(
    private readonly aggregator: StatementAggregator,
    private readonly accountService: AccountService
  ) {}

  async getStatement(
    accountHolderId: string,
    accountId: string,
    year: number | undefined,
    month: number | undefined
  ): Promise<StatementView> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);
    return this.aggregator.statement(accountId, year, month);
  }
}
