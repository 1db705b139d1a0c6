import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { AccountHolderController } from './account-holder.controller';
import { updateProfileValidation } from './account-holder.validation';

export const createAccountHolderRoutes = (controller: AccountHolderController): Router => {
  const router = Router();

  // GET /account-holders/me - Own profile
  router.get(
    '/me',
    (req: Request, res: Response, next: NextFunction) => controller.getMe(req, res, next)
  );

  // PATCH /account-holders/me - Update names or phone
  router.patch(
    '/me',
    updateProfileValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.updateMe(req, res, next)
  );

  return router;
};
