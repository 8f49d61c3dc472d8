import { body, param, query } from 'express-validator';

import { MovementKind } from '../../types/ledger';
import { toMinorUnits } from '../../utils/money';

/**
 * Amount must parse as a decimal with at most 2 places. Its sign is checked by
 * the engine, which answers INVALID_AMOUNT.
 */
const amountFormat = (value: unknown): boolean => {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new Error('Amount must be a decimal string or number');
  }
  toMinorUnits(value);
  return true;
};

export const createMovementValidation = [
  body('accountNumber')
    .notEmpty()
    .withMessage('Account number is required')
    .isInt({ min: 1 })
    .withMessage('Account number must be a positive integer')
    .toInt(),
  body('kind')
    .notEmpty()
    .withMessage('Kind is required')
    .isIn([MovementKind.CREDIT, MovementKind.DEBIT])
    .withMessage('Kind must be CREDIT or DEBIT'),
  body('amount').exists({ values: 'null' }).withMessage('Amount is required').bail().custom(amountFormat),
  body('transactionId')
    .isString()
    .withMessage('Transaction ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Transaction ID is required')
    .isLength({ max: 128 })
    .withMessage('Transaction ID must be at most 128 characters'),
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 255 })
    .withMessage('Description must be at most 255 characters'),
  body('reference')
    .optional()
    .isString()
    .withMessage('Reference must be a string')
    .isLength({ max: 100 })
    .withMessage('Reference must be at most 100 characters'),
];

export const movementIdValidation = [
  param('movementId').isUUID(4).withMessage('Movement ID must be a UUID'),
];

export const reverseMovementValidation = [
  ...movementIdValidation,
  body('transactionId')
    .isString()
    .withMessage('Transaction ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Transaction ID is required')
    .isLength({ max: 128 })
    .withMessage('Transaction ID must be at most 128 characters'),
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 255 })
    .withMessage('Description must be at most 255 characters'),
];

export const searchMovementsValidation = [
  query('accountNumber').optional().isInt({ min: 1 }).withMessage('Account number must be a positive integer').toInt(),
  query('customerId').optional().isString().trim().notEmpty().withMessage('customerId must not be empty'),
  query('kind')
    .optional()
    .isIn(Object.values(MovementKind))
    .withMessage(`Kind must be one of ${Object.values(MovementKind).join(', ')}`),
  query('startDate').optional().isISO8601({ strict: true }).withMessage('startDate must be a date in YYYY-MM-DD format'),
  query('endDate').optional().isISO8601({ strict: true }).withMessage('endDate must be a date in YYYY-MM-DD format'),
  query('page').optional().isInt({ min: 0 }).withMessage('page must be 0 or more').toInt(),
  query('size').optional().isInt({ min: 1, max: 100 }).withMessage('size must be between 1 and 100').toInt(),
];
