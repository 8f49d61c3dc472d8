import { query } from 'express-validator';

export const statementQueryValidation = [
  query('customerId').isString().trim().notEmpty().withMessage('customerId is required'),
  query('startDate').isISO8601({ strict: true }).withMessage('startDate must be a date in YYYY-MM-DD format'),
  query('endDate').isISO8601({ strict: true }).withMessage('endDate must be a date in YYYY-MM-DD format'),
];

export const movementsSummaryValidation = [
  query('startDate').isISO8601({ strict: true }).withMessage('startDate must be a date in YYYY-MM-DD format'),
  query('endDate').isISO8601({ strict: true }).withMessage('endDate must be a date in YYYY-MM-DD format'),
  query('accountNumber').optional().isInt({ min: 1 }).withMessage('Account number must be a positive integer').toInt(),
  query('customerId').optional().isString().trim().notEmpty().withMessage('customerId must not be empty'),
];
