/**
 * Middleware Exports
 */

export {
  errorHandler,
  notFoundHandler,
  ApiError,
  LockTimeoutError,
  asyncHandler,
} from './errorHandler';
export type { AppError } from './errorHandler';

export { validateRequest, groupValidationErrors } from './validateRequest';

export { globalLimiter, authLimiter, ledgerLimiter } from './rateLimiter';
