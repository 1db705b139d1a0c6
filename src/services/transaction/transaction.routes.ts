import { Router, Request, Response, NextFunction } from 'express';

import { ledgerLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { TransactionController } from './transaction.controller';
import {
  createTransactionValidation,
  getTransactionValidation,
  listTransactionsValidation,
} from './transaction.validation';

/**
 * Mounted under /accounts/:accountId/transactions
 */
export const createTransactionRoutes = (transactionController: TransactionController): Router => {
  const router = Router({ mergeParams: true });

  // POST /accounts/:accountId/transactions - Authorize a credit or debit
  router.post(
    '/',
    ledgerLimiter,
    createTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.create(req, res, next)
  );

  // GET /accounts/:accountId/transactions - Account history
  router.get(
    '/',
    listTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.list(req, res, next)
  );

  // GET /accounts/:accountId/transactions/:transactionId
  router.get(
    '/:transactionId',
    getTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.getById(req, res, next)
  );

  return router;
};
