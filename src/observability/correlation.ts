import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/**
 * Takes the caller's x-correlation-id (or x-request-id), or mints one, and
 * keeps it in AsyncLocalStorage for the request. The auth middleware adds the
 * user and account holder to the same context.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    headerValue(req.headers['x-correlation-id']) ||
    headerValue(req.headers['x-request-id']) ||
    uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  const startedAt = Date.now();

  asyncLocalStorage.run(context, () => {
    logger.debug({ correlationId, method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      const entry = {
        correlationId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
        userId: context.userId,
        accountHolderId: context.accountHolderId,
      };
      if (res.statusCode >= 500) {
        logger.error(entry, 'Request failed');
      } else {
        logger.info(entry, 'Request completed');
      }
    });

    next();
  });
};
