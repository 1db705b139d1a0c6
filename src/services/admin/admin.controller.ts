import { Request, Response, NextFunction } from 'express';

import { AccountService } from '../account/account.service';
import { filtersFromQuery } from '../transaction/transaction.filters';
import { TransactionService } from '../transaction/transaction.service';

/**
 * Read-only oversight across all holders. Mounted behind requireRole(ADMIN).
 */
export class AdminController {
  constructor(
    private readonly accountService: AccountService,
    private readonly transactionService: TransactionService
  ) {}

  /**
   * GET /admin/accounts
   */
  async listAccounts(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accounts = await this.accountService.adminListAccounts();

      res.status(200).json({
        success: true,
        data: { accounts },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/accounts/:accountId
   */
  async getAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.adminGetAccount(req.params.accountId);

      res.status(200).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/accounts/:accountId/balance
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const balance = await this.accountService.adminGetBalance(req.params.accountId);

      res.status(200).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/accounts/:accountId/transactions
   */
  async listAccountTransactions(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const transactions = await this.transactionService.adminListForAccount(
        req.params.accountId,
        filtersFromQuery(req)
      );

      res.status(200).json({
        success: true,
        data: { transactions },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/transactions
   */
  async listTransactions(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountId = typeof req.query.accountId === 'string' ? req.query.accountId : undefined;
      const transactions = await this.transactionService.adminList({
        ...filtersFromQuery(req),
        accountId,
      });

      res.status(200).json({
        success: true,
        data: { transactions },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/transactions/:transactionId
   */
  async getTransaction(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactionService.adminGet(req.params.transactionId);

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }
}
