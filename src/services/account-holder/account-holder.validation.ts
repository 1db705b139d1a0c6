import { body } from 'express-validator';

const nameField = (field: string, label: string) =>
  body(field)
    .optional()
    .isString()
    .withMessage(`${label} must be a string`)
    .trim()
    .isLength({ min: 1, max: 100 })
    .withMessage(`${label} must be between 1 and 100 characters`);

export const updateProfileValidation = [
  nameField('firstName', 'First name'),
  nameField('lastName', 'Last name'),
  body('phone')
    .optional({ values: 'null' })
    .isString()
    .withMessage('Phone must be a string')
    .trim()
    .isLength({ min: 1, max: 32 })
    .withMessage('Phone must be between 1 and 32 characters'),
];
