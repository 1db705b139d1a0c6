import { Response, NextFunction, RequestHandler } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';
import { UserType } from '../types/identity';

import { AuthService } from './auth.service';
import { AuthRequest, MemberRequest } from './auth.types';

const bearerToken = (header: string | undefined): string => {
  if (!header) {
    throw ApiError.unauthorized('No authorization header provided');
  }
  if (!header.startsWith('Bearer ')) {
    throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
  }
  const token = header.substring(7).trim();
  if (!token) {
    throw ApiError.unauthorized('No token provided');
  }
  return token;
};

/**
 * Verify the bearer token and attach the caller's identity to req.user
 */
export const createAuthMiddleware = (authService: AuthService) => {
  return async (req: AuthRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const payload = authService.verifyToken(bearerToken(req.headers.authorization));
      const user = await authService.getUserById(payload.userId);

      if (!user) {
        throw ApiError.unauthorized('User not found');
      }
      if (!user.isActive) {
        throw ApiError.forbidden('Account is deactivated');
      }

      const accountHolderId =
        user.userType === UserType.MEMBER ? await authService.getAccountHolderId(user.id) : null;

      req.user = {
        id: user.id,
        email: user.email,
        userType: user.userType,
        accountHolderId,
      };
      addLogContext({ userId: user.id, accountHolderId: accountHolderId ?? undefined });
      next();
    } catch (error) {
      next(error);
    }
  };
};

export const requireRole = (...roles: UserType[]): RequestHandler => {
  return (req: AuthRequest, _res, next) => {
    if (!req.user) {
      next(ApiError.unauthorized());
      return;
    }
    if (!roles.includes(req.user.userType)) {
      next(ApiError.forbidden('Insufficient permissions for this resource'));
      return;
    }
    next();
  };
};

/**
 * Members with an account holder only. Copies the holder id onto the request.
 */
export const requireMember: RequestHandler = (req: MemberRequest, _res, next) => {
  if (!req.user) {
    next(ApiError.unauthorized());
    return;
  }
  if (req.user.userType !== UserType.MEMBER || !req.user.accountHolderId) {
    next(ApiError.forbidden('Only members with an account holder profile can do this'));
    return;
  }
  req.accountHolderId = req.user.accountHolderId;
  next();
};

/**
 * Holder id set by requireMember; throws if the route forgot to mount it
 */
export const holderIdOf = (req: MemberRequest): string => {
  if (!req.accountHolderId) {
    throw ApiError.forbidden('Only members with an account holder profile can do this');
  }
  return req.accountHolderId;
};
