import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';
import { sendDeclined } from '../../utils/declined';

import { filtersFromQuery } from './transaction.filters';
import { CreateTransactionDTO, pageSize, TransactionService } from './transaction.service';

export class TransactionController {
  constructor(private readonly transactionService: TransactionService) {}

  /**
   * Authorize a credit or debit
   * POST /accounts/:accountId/transactions
   */
  async create(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: CreateTransactionDTO = {
        type: req.body.type,
        amount: req.body.amount,
        description: req.body.description ?? null,
        cardId: req.body.cardId ?? null,
      };

      const result = await this.transactionService.create(
        holderIdOf(req),
        req.params.accountId,
        dto
      );

      if (result.outcome === 'declined') {
        sendDeclined(res, 'Insufficient funds', { transaction: result.transaction });
        return;
      }

      res.status(201).json({
        success: true,
        data: { transaction: result.transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountId/transactions
   */
  async list(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const filters = filtersFromQuery(req);
      const transactions = await this.transactionService.list(
        holderIdOf(req),
        req.params.accountId,
        filters
      );

      res.status(200).json({
        success: true,
        data: {
          transactions,
          pagination: {
            limit: pageSize(filters.limit),
            offset: filters.offset ?? 0,
            count: transactions.length,
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountId/transactions/:transactionId
   */
  async getById(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactionService.get(
        holderIdOf(req),
        req.params.accountId,
        req.params.transactionId
      );

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }
}
