import { body } from 'express-validator';

import { amountField, descriptionField } from '../transaction/transaction.validation';

const accountIdField = (field: string, label: string) =>
  body(field)
    .notEmpty()
    .withMessage(`${label} is required`)
    .isString()
    .withMessage(`${label} must be a string`)
    .isLength({ max: 64 })
    .withMessage(`${label} cannot exceed 64 characters`);

export const createTransferValidation = [
  accountIdField('fromAccountId', 'Source account ID'),
  accountIdField('toAccountId', 'Destination account ID'),
  amountField(),
  descriptionField(),
];
