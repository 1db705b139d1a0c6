import { Router, Request, Response, NextFunction } from 'express';

import { ledgerLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { TransferController } from './transfer.controller';
import { createTransferValidation } from './transfer.validation';

export const createTransferRoutes = (transferController: TransferController): Router => {
  const router = Router();

  // POST /transfers - Move money between two accounts
  router.post(
    '/',
    ledgerLimiter,
    createTransferValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transferController.create(req, res, next)
  );

  return router;
};
