import { Router, Request, Response, NextFunction } from 'express';
import { query } from 'express-validator';

import { validateRequest } from '../../middlewares/validateRequest';
import { getAccountValidation } from '../account/account.validation';
import { listTransactionsQuery } from '../transaction/transaction.validation';

import { AdminController } from './admin.controller';

const adminTransactionsValidation = [
  ...listTransactionsQuery,
  query('accountId').optional().isString().withMessage('Account ID must be a string'),
];

/**
 * Mounted under /admin behind authentication and requireRole(ADMIN)
 */
export const createAdminRoutes = (adminController: AdminController): Router => {
  const router = Router();

  router.get(
    '/accounts',
    (req: Request, res: Response, next: NextFunction) => adminController.listAccounts(req, res, next)
  );

  router.get(
    '/accounts/:accountId',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.getAccount(req, res, next)
  );

  router.get(
    '/accounts/:accountId/balance',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.getBalance(req, res, next)
  );

  router.get(
    '/accounts/:accountId/transactions',
    getAccountValidation,
    listTransactionsQuery,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.listAccountTransactions(req, res, next)
  );

  router.get(
    '/transactions',
    adminTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => adminController.listTransactions(req, res, next)
  );

  router.get(
    '/transactions/:transactionId',
    (req: Request, res: Response, next: NextFunction) => adminController.getTransaction(req, res, next)
  );

  return router;
};
