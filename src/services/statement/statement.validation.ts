import { query } from 'express-validator';

import { MAX_STATEMENT_YEAR, MIN_STATEMENT_YEAR } from '../ledger';
import { accountIdParam } from '../account/account.validation';

export const statementValidation = [
  accountIdParam(),
  query('year')
    .notEmpty()
    .withMessage('Year is required')
    .isInt({ min: MIN_STATEMENT_YEAR, max: MAX_STATEMENT_YEAR })
    .withMessage(`Year must be between ${MIN_STATEMENT_YEAR} and ${MAX_STATEMENT_YEAR}`)
    .toInt(),
  query('month')
    .notEmpty()
    .withMessage('Month is required')
    .isInt({ min: 1, max: 12 })
    .withMessage('Month must be between 1 and 12')
    .toInt(),
];
