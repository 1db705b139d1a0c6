import { body, param, query } from 'express-validator';

import { TransactionStatus, TransactionType } from '../../types/ledger';
import { accountIdParam } from '../account/account.validation';

import { MAX_PAGE_SIZE } from './transaction.service';

export const amountField = (field = 'amount') =>
  body(field)
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .custom((value) => typeof value === 'number' && Number.isSafeInteger(value) && value > 0)
    .withMessage('Amount must be a positive integer number of cents');

export const descriptionField = () =>
  body('description')
    .optional({ values: 'null' })
    .isString()
    .withMessage('Description must be a string')
    .trim()
    .isLength({ max: 255 })
    .withMessage('Description cannot exceed 255 characters');

export const createTransactionValidation = [
  accountIdParam(),
  body('type')
    .notEmpty()
    .withMessage('Type is required')
    .isIn(Object.values(TransactionType))
    .withMessage(`Type must be one of: ${Object.values(TransactionType).join(', ')}`),
  amountField(),
  descriptionField(),
  body('cardId')
    .optional({ values: 'null' })
    .isString()
    .withMessage('Card ID must be a string')
    .isLength({ min: 1, max: 64 })
    .withMessage('Card ID must be between 1 and 64 characters'),
];

export const listTransactionsQuery = [
  query('status')
    .optional()
    .isIn(Object.values(TransactionStatus))
    .withMessage(`Status must be one of: ${Object.values(TransactionStatus).join(', ')}`),
  query('type')
    .optional()
    .isIn(Object.values(TransactionType))
    .withMessage(`Type must be one of: ${Object.values(TransactionType).join(', ')}`),
  query('limit')
    .optional()
    .isInt({ min: 1, max: MAX_PAGE_SIZE })
    .withMessage(`Limit must be between 1 and ${MAX_PAGE_SIZE}`)
    .toInt(),
  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Offset must be a non-negative integer')
    .toInt(),
];

export const listTransactionsValidation = [accountIdParam(), ...listTransactionsQuery];

export const getTransactionValidation = [
  accountIdParam(),
  param('transactionId')
    .isString()
    .withMessage('Transaction ID must be a string')
    .isLength({ min: 1, max: 64 })
    .withMessage('Transaction ID must be between 1 and 64 characters'),
];
