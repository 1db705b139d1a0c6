import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';
import { AccountType } from '../../types/ledger';

import { AccountService } from './account.service';

export class AccountController {
  constructor(private readonly accountService: AccountService) {}

  /**
   * POST /accounts
   */
  async create(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountType: AccountType = req.body.accountType ?? AccountType.CHECKING;
      const account = await this.accountService.openAccount(holderIdOf(req), accountType);

      res.status(201).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts
   */
  async list(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const accounts = await this.accountService.listAccounts(holderIdOf(req));

      res.status(200).json({
        success: true,
        data: { accounts },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/lookup?accountNumber=
   */
  async lookup(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.lookupByNumber(String(req.query.accountNumber));

      res.status(200).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountId
   */
  async getById(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getOwnedAccount(
        req.params.accountId,
        holderIdOf(req)
      );

      res.status(200).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountId/balance
   */
  async getBalance(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const balance = await this.accountService.getBalance(req.params.accountId, holderIdOf(req));

      res.status(200).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }
}
