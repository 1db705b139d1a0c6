/**
 * Rate Limiting Middleware
 *
 * Limits are per process (express-rate-limit memory store) and configured per
 * environment in RATE_LIMIT_CONFIG. RATE_LIMIT_DISABLED=true turns every limiter
 * into a pass-through.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { logger } from '../observability';
import { AuthRequest } from '../auth/auth.types';
import { ErrorCode } from '../types/errors';

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const limitMessage = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
  },
});

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter, applied to all routes except health and metrics
 */
export const globalLimiter = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    limit: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Strict limiter for signup and login
 */
export const authLimiter = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.auth.windowMs,
    limit: RATE_LIMIT_CONFIG.auth.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_LOGIN_ATTEMPTS,
      'Too many login attempts, please try again later'
    ),
    keyGenerator: (req) => {
      const email = typeof req.body?.email === 'string' ? req.body.email.toLowerCase() : '';
      return `${req.ip}:${email}`;
    },
    validate: false,
  })
);

/**
 * Limiter for money-moving endpoints, keyed by user when authenticated
 */
export const ledgerLimiter = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.ledger.windowMs,
    limit: RATE_LIMIT_CONFIG.ledger.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(
      ErrorCode.TOO_MANY_TRANSACTIONS,
      'Too many transactions, please try again later'
    ),
    keyGenerator: (req: AuthRequest) => req.user?.id || req.ip || 'unknown',
    validate: false,
  })
);
