import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { StatementController } from './statement.controller';
import { statementValidation } from './statement.validation';

/**
 * Mounted under /accounts/:accountId/statements
 */
export const createStatementRoutes = (statementController: StatementController): Router => {
  const router = Router({ mergeParams: true });

  // GET /accounts/:accountId/statements?year=&month=
  router.get(
    '/',
    statementValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => statementController.get(req, res, next)
  );

  return router;
};
