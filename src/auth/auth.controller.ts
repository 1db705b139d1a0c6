import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';

import { AuthService, toPublicUser } from './auth.service';
import { AuthRequest, LoginDTO, SignupDTO } from './auth.types';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /auth/signup
   */
  async signup(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: SignupDTO = {
        email: req.body.email,
        password: req.body.password,
        firstName: req.body.firstName,
        lastName: req.body.lastName,
        phone: req.body.phone ?? null,
      };

      const result = await this.authService.signup(dto);

      res.status(201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /auth/login
   */
  async login(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: LoginDTO = {
        email: req.body.email,
        password: req.body.password,
      };

      const result = await this.authService.login(dto);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /auth/me
   */
  async me(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.user) {
        throw ApiError.unauthorized();
      }

      const user = await this.authService.getUserById(req.user.id);
      if (!user) {
        throw ApiError.notFound('user', req.user.id);
      }

      res.status(200).json({
        success: true,
        data: {
          user: toPublicUser(user),
          accountHolderId: req.user.accountHolderId,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
