import { body, param, query } from 'express-validator';

import { AccountCategory } from '../../types/ledger';

export const createAccountValidation = [
  body('customerId')
    .isString()
    .withMessage('Customer ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Customer ID is required')
    .isLength({ max: 64 })
    .withMessage('Customer ID must be at most 64 characters'),
  body('category')
    .notEmpty()
    .withMessage('Category is required')
    .isIn(Object.values(AccountCategory))
    .withMessage(`Category must be one of ${Object.values(AccountCategory).join(', ')}`),
];

export const accountNumberValidation = [
  param('accountNumber').isInt({ min: 1 }).withMessage('Account number must be a positive integer').toInt(),
];

export const listMovementsValidation = [
  ...accountNumberValidation,
  query('limit').optional().isInt({ min: 1, max: 100 }).withMessage('Limit must be between 1 and 100').toInt(),
];

export const deleteAccountValidation = [
  ...accountNumberValidation,
  query('hard').optional().isBoolean({ strict: true }).withMessage('hard must be true or false'),
];

export const customerIdValidation = [
  param('customerId').trim().notEmpty().withMessage('Customer ID is required'),
];

export const listAccountsValidation = [
  query('customerId').optional().isString().trim().notEmpty().withMessage('customerId must not be empty'),
  query('category')
    .optional()
    .isIn(Object.values(AccountCategory))
    .withMessage(`Category must be one of ${Object.values(AccountCategory).join(', ')}`),
  query('active').optional().isBoolean({ strict: true }).withMessage('active must be true or false'),
];

export const updateAccountValidation = [
  ...accountNumberValidation,
  body()
    .custom((value: unknown) => typeof value === 'object' && value !== null && ('category' in value || 'active' in value))
    .withMessage('Provide category or active'),
  body('category')
    .optional()
    .isIn(Object.values(AccountCategory))
    .withMessage(`Category must be one of ${Object.values(AccountCategory).join(', ')}`),
  body('active').optional().isBoolean({ strict: true }).withMessage('active must be true or false').toBoolean(true),
];

export const updateStateValidation = [
  ...accountNumberValidation,
  body('active')
    .exists({ values: 'null' })
    .withMessage('active is required')
    .bail()
    .isBoolean({ strict: true })
    .withMessage('active must be true or false')
    .toBoolean(true),
];
