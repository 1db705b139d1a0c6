import { Router, Request, Response, NextFunction, RequestHandler } from 'express';

import { authLimiter } from '../middlewares/rateLimiter';
import { validateRequest } from '../middlewares/validateRequest';

import { AuthController } from './auth.controller';
import { signupValidation, loginValidation } from './auth.validation';

export const createAuthRoutes = (
  authController: AuthController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.post(
    '/signup',
    authLimiter,
    signupValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => authController.signup(req, res, next)
  );

  router.post(
    '/login',
    authLimiter,
    loginValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => authController.login(req, res, next)
  );

  router.get(
    '/me',
    authenticate,
    (req: Request, res: Response, next: NextFunction) => authController.me(req, res, next)
  );

  return router;
};
