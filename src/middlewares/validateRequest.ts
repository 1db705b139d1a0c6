import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationError } from 'express-validator';

import { ApiError } from './errorHandler';

const fieldOf = (err: ValidationError): string => (err.type === 'field' ? err.path : err.type);

/**
 * Group express-validator errors by field
 */
export const groupValidationErrors = (errors: ValidationError[]): Record<string, string[]> =>
  errors.reduce<Record<string, string[]>>((acc, err) => {
    const field = fieldOf(err);
    if (!acc[field]) acc[field] = [];
    acc[field].push(String(err.msg));
    return acc;
  }, {});

/**
 * Reusable validation middleware that turns express-validator errors
 * into a 400 ApiError with per-field details
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    next(ApiError.validationError('Validation failed', groupValidationErrors(errors.array())));
    return;
  }

  next();
};
