/**
 * Error codes for the ledger bank API
 *
 * Categorized by error type:
 * - 1xxx: Authentication and authorization errors
 * - 2xxx: Validation errors
 * - 3xxx: Business / lookup errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  INVALID_CREDENTIALS = 1004,
  FORBIDDEN = 1005,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  SAME_ACCOUNT_TRANSFER = 2005,
  INVALID_PERIOD = 2006,
  CARD_NOT_USABLE = 2007,

  // Business errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  USER_NOT_FOUND = 3002,
  ACCOUNT_NOT_FOUND = 3003,
  TRANSACTION_NOT_FOUND = 3004,
  CARD_NOT_FOUND = 3005,
  ACCOUNT_HOLDER_NOT_FOUND = 3006,
  DUPLICATE_CARD = 3007,
  EMAIL_ALREADY_REGISTERED = 3008,
  DUPLICATE_ACCOUNT_NUMBER = 3009,
  RESOURCE_NOT_FOUND = 3010,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_LOGIN_ATTEMPTS = 4002,
  TOO_MANY_TRANSACTIONS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  LOCK_TIMEOUT = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.INVALID_CREDENTIALS]: 401,
  [ErrorCode.FORBIDDEN]: 403,

  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.SAME_ACCOUNT_TRANSFER]: 400,
  [ErrorCode.INVALID_PERIOD]: 400,
  [ErrorCode.CARD_NOT_USABLE]: 400,

  // Request was well-formed but refused; the declined row is already committed
  [ErrorCode.INSUFFICIENT_FUNDS]: 422,
  [ErrorCode.USER_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.CARD_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_HOLDER_NOT_FOUND]: 404,
  [ErrorCode.DUPLICATE_CARD]: 409,
  [ErrorCode.EMAIL_ALREADY_REGISTERED]: 409,
  [ErrorCode.DUPLICATE_ACCOUNT_NUMBER]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_LOGIN_ATTEMPTS]: 429,
  [ErrorCode.TOO_MANY_TRANSACTIONS]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.LOCK_TIMEOUT]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    retryable?: boolean;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Declined business outcome: an error envelope that also carries the audit row
 */
export interface DeclinedResponse<T = unknown> extends ErrorResponse {
  data: T;
}
