/**
 * Error Handling Middleware
 *
 * Centralized error handling with a consistent error response format,
 * correlation-aware logging and sanitization of 5xx messages in production.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  retryable?: boolean;
  validationErrors?: Record<string, string[]>;
}

interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  retryable?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  retryable: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(errorCode: ErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options.statusCode ?? errorCodeToStatus[errorCode] ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.validationErrors = options.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Not authenticated'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static invalidCredentials(message = 'Invalid email or password'): ApiError {
    return new ApiError(ErrorCode.INVALID_CREDENTIALS, message);
  }

  static forbidden(message = 'You do not have access to this resource'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static invalidAmount(message = 'Amount must be a positive integer number of cents'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static sameAccountTransfer(message = 'Cannot transfer to the same account'): ApiError {
    return new ApiError(ErrorCode.SAME_ACCOUNT_TRANSFER, message);
  }

  static invalidPeriod(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_PERIOD, message);
  }

  static cardNotUsable(message: string): ApiError {
    return new ApiError(ErrorCode.CARD_NOT_USABLE, message);
  }

  static notFound(resource: string, id?: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      user: ErrorCode.USER_NOT_FOUND,
      account: ErrorCode.ACCOUNT_NOT_FOUND,
      transaction: ErrorCode.TRANSACTION_NOT_FOUND,
      card: ErrorCode.CARD_NOT_FOUND,
      'account holder': ErrorCode.ACCOUNT_HOLDER_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] ?? ErrorCode.RESOURCE_NOT_FOUND;
    const label = resource.charAt(0).toUpperCase() + resource.slice(1);
    return new ApiError(code, id ? `${label} ${id} not found` : `${label} not found`);
  }

  static duplicateCard(accountId: string): ApiError {
    return new ApiError(ErrorCode.DUPLICATE_CARD, `Account ${accountId} already has a card`);
  }

  static duplicateAccountNumber(accountNumber: string): ApiError {
    return new ApiError(ErrorCode.DUPLICATE_ACCOUNT_NUMBER, `Account number ${accountNumber} is taken`);
  }

  static emailAlreadyRegistered(email: string): ApiError {
    return new ApiError(ErrorCode.EMAIL_ALREADY_REGISTERED, `Email ${email} is already registered`);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }

  static database(message = 'Database unavailable, please retry'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message, { retryable: true });
  }
}

/**
 * Raised when a unit of work cannot take an account lock within the configured bound.
 * Nothing has been applied; the caller may retry.
 */
export class LockTimeoutError extends ApiError {
  readonly resourceId: string;

  constructor(resourceId: string, timeoutMs: number) {
    super(
      ErrorCode.LOCK_TIMEOUT,
      `Timed out after ${timeoutMs}ms waiting for a lock on ${resourceId}; please retry`,
      { retryable: true }
    );
    this.name = 'LockTimeoutError';
    this.resourceId = resourceId;
  }
}

const isAppError = (err: unknown): err is AppError => err instanceof Error;

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';
  const error: AppError = isAppError(err) ? err : new Error(String(err));

  const errorCode = error.errorCode ?? ErrorCode.INTERNAL_ERROR;
  const statusCode = error.statusCode ?? errorCodeToStatus[errorCode] ?? 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: error.message,
    stack: config.isDevelopment ? error.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: error.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${error.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${error.message}`);
  }

  const message =
    config.isProduction && statusCode >= 500 && !error.retryable
      ? 'Internal server error'
      : error.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (error.validationErrors) {
    response.error.details = error.validationErrors;
  }

  if (error.retryable) {
    response.error.retryable = true;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId() || 'unknown',
    },
  };

  res.status(404).json(response);
};

/**
 * Async handler wrapper to forward rejected promises to the error middleware
 */
export const asyncHandler = <R extends Request = Request>(
  fn: (req: R, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: R, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
