import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';
import { sendDeclined } from '../../utils/declined';

import { TransferDTO, TransferService } from './transfer.service';

export class TransferController {
  constructor(private readonly transferService: TransferService) {}

  /**
   * POST /transfers
   */
  async create(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: TransferDTO = {
        fromAccountId: req.body.fromAccountId,
        toAccountId: req.body.toAccountId,
        amount: req.body.amount,
        description: req.body.description ?? null,
      };

      const result = await this.transferService.transfer(holderIdOf(req), dto);

      if (result.outcome === 'declined') {
        sendDeclined(res, 'Insufficient funds for transfer', {
          debitTransaction: result.debitTransaction,
          amount: result.amount,
          fromAccountId: result.fromAccountId,
          toAccountId: result.toAccountId,
        });
        return;
      }

      res.status(201).json({
        success: true,
        data: {
          transferPairId: result.transferPairId,
          debitTransaction: result.debitTransaction,
          creditTransaction: result.creditTransaction,
          amount: result.amount,
          fromAccountId: result.fromAccountId,
          toAccountId: result.toAccountId,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
