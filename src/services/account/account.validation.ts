import { body, param, query } from 'express-validator';

import { AccountType } from '../../types/ledger';

export const accountIdParam = (name = 'accountId') =>
  param(name)
    .isString()
    .withMessage('Account ID must be a string')
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('Account ID must be between 1 and 64 characters');

export const createAccountValidation = [
  body('accountType')
    .optional()
    .isIn(Object.values(AccountType))
    .withMessage(`Account type must be one of: ${Object.values(AccountType).join(', ')}`),
];

export const getAccountValidation = [accountIdParam()];

export const lookupAccountValidation = [
  query('accountNumber')
    .notEmpty()
    .withMessage('Account number is required')
    .matches(/^\d{10}$/)
    .withMessage('Account number must be 10 digits'),
];
