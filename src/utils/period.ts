/**
 * Report periods are whole UTC days given as YYYY-MM-DD, both ends inclusive.
 */

import { ApiError } from '../middlewares/errorHandler';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const LAST_MS_OF_DAY = 24 * 60 * 60 * 1000 - 1;

export interface StatementPeriod {
  from: Date;
  to: Date;
}

export interface DayRange {
  from?: Date;
  to?: Date;
}

const parseDay = (value: string, field: string): Date => {
  const day = new Date(`${value}T00:00:00.000Z`);
  if (!DAY_PATTERN.test(value) || Number.isNaN(day.getTime()) || day.toISOString().slice(0, 10) !== value) {
    throw ApiError.validationError(`${field} must be a date in YYYY-MM-DD format`);
  }
  return day;
};

/**
 * Either end may be left open
 */
export const toDayRange = (startDate?: string, endDate?: string): DayRange => {
  const from = startDate !== undefined ? parseDay(startDate, 'startDate') : undefined;
  const endDay = endDate !== undefined ? parseDay(endDate, 'endDate') : undefined;
  if (from && endDay && from.getTime() > endDay.getTime()) {
    throw ApiError.validationError('startDate must not be after endDate');
  }
  return { from, to: endDay ? new Date(endDay.getTime() + LAST_MS_OF_DAY) : undefined };
};

export const toStatementPeriod = (startDate: string, endDate: string): StatementPeriod => {
  const { from, to } = toDayRange(startDate, endDate);
  if (!from || !to) {
    throw ApiError.validationError('startDate and endDate are required');
  }
  return { from, to };
};
