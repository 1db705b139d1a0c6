import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';
import { getAccountValidation } from '../account/account.validation';

import { CardController } from './card.controller';

/**
 * Mounted under /accounts/:accountId/card
 */
export const createCardRoutes = (cardController: CardController): Router => {
  const router = Router({ mergeParams: true });

  router.post(
    '/',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => cardController.issue(req, res, next)
  );

  router.get(
    '/',
    getAccountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => cardController.get(req, res, next)
  );

  return router;
};
