import express, { Application } from 'express';
import request from 'supertest';

import {
  ApiError,
  LockTimeoutError,
  asyncHandler,
  errorHandler,
  notFoundHandler,
} from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';

const appThrowing = (error: unknown): Application => {
  const app = express();
  app.get(
    '/boom',
    asyncHandler(async () => {
      throw error;
    })
  );
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

describe('ApiError', () => {
  it('should take its status from the error code', () => {
    expect(ApiError.notFound('account', 'acct-1')).toMatchObject({
      errorCode: ErrorCode.ACCOUNT_NOT_FOUND,
      statusCode: 404,
      message: 'Account acct-1 not found',
      isOperational: true,
    });
    expect(ApiError.duplicateCard('acct-1').statusCode).toBe(409);
    expect(ApiError.invalidPeriod('bad').statusCode).toBe(400);
    expect(ApiError.forbidden().statusCode).toBe(403);
  });

  it('should fall back to the generic not-found code for other resources', () => {
    const error = ApiError.notFound('widget');

    expect(error.errorCode).toBe(ErrorCode.RESOURCE_NOT_FOUND);
    expect(error.message).toBe('Widget not found');
  });

  it('should map the account holder resource', () => {
    expect(ApiError.notFound('account holder', 'h-1').errorCode).toBe(
      ErrorCode.ACCOUNT_HOLDER_NOT_FOUND
    );
  });

  it('should mark internal errors as non-operational', () => {
    expect(ApiError.internal().isOperational).toBe(false);
  });

  it('should make database errors a retryable 503', () => {
    const error = ApiError.database();

    expect(error.errorCode).toBe(ErrorCode.DATABASE_ERROR);
    expect(error.statusCode).toBe(503);
    expect(error.retryable).toBe(true);
  });
});

describe('LockTimeoutError', () => {
  it('should be a retryable 503', () => {
    const error = new LockTimeoutError('acct-1', 250);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.LOCK_TIMEOUT,
      statusCode: 503,
      retryable: true,
      resourceId: 'acct-1',
      message: 'Timed out after 250ms waiting for a lock on acct-1; please retry',
    });
  });
});

describe('errorHandler', () => {
  it('should render an ApiError in the standard envelope', async () => {
    const response = await request(appThrowing(ApiError.notFound('card'))).get('/boom');

    expect(response.status).toBe(404);
    expect(response.body.success).toBe(false);
    expect(response.body.error.code).toBe(ErrorCode.CARD_NOT_FOUND);
    expect(response.body.error.message).toBe('Card not found');
    expect(typeof response.body.error.timestamp).toBe('string');
    expect(response.body.error).not.toHaveProperty('retryable');
  });

  it('should include validation details', async () => {
    const error = ApiError.validationError('Validation failed', { amount: ['Amount is required'] });

    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(400);
    expect(response.body.error.details).toEqual({ amount: ['Amount is required'] });
  });

  it('should flag retryable errors', async () => {
    const response = await request(appThrowing(new LockTimeoutError('acct-1', 100))).get('/boom');

    expect(response.status).toBe(503);
    expect(response.body.error.code).toBe(ErrorCode.LOCK_TIMEOUT);
    expect(response.body.error.retryable).toBe(true);
  });

  it('should treat unknown errors as internal', async () => {
    const response = await request(appThrowing(new Error('kaboom'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(response.body.error.message).toBe('kaboom');
  });

  it('should handle thrown non-errors', async () => {
    const response = await request(appThrowing('plain string')).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.message).toBe('plain string');
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(appThrowing(new Error('unused'))).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe(ErrorCode.RESOURCE_NOT_FOUND);
    expect(response.body.error.message).toBe('Route GET /nowhere not found');
  });
});
