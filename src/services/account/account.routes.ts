import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { AccountController } from './account.controller';
import {
  createAccountValidation,
  getAccountValidation,
  lookupAccountValidation,
} from './account.validation';

/**
 * Mounted under /accounts behind authentication and requireMember
 */
export const createAccountRoutes = (accountController: AccountController): Router => {
  const router = Router();

  // POST /accounts - Open an account
  router.post(
    '/',
    createAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => accountController.create(req, res, next)
  );

  // GET /accounts - List own accounts
  router.get(
    '/',
    (req: Request, res: Response, next: NextFunction) => accountController.list(req, res, next)
  );

  // GET /accounts/lookup - Resolve an account number
  router.get(
    '/lookup',
    lookupAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => accountController.lookup(req, res, next)
  );

  // GET /accounts/:accountId
  router.get(
    '/:accountId',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => accountController.getById(req, res, next)
  );

  // GET /accounts/:accountId/balance - Cached and computed balance
  router.get(
    '/:accountId/balance',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => accountController.getBalance(req, res, next)
  );

  return router;
};
