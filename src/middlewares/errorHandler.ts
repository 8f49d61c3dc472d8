/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Body-parser marks malformed JSON with a 4xx status and type 'entity.parse.failed'
 */
const isClientSyntaxError = (err: AppError): boolean =>
  err instanceof SyntaxError && typeof err.statusCode === 'number' && err.statusCode < 500;

/**
 * Driver errors raised while MongoDB cannot be reached
 */
const DATABASE_UNAVAILABLE_ERRORS = new Set([
  'MongoServerSelectionError',
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
]);

const classify = (err: AppError): ErrorCode => {
  if (err.errorCode) return err.errorCode;
  if (isClientSyntaxError(err)) return ErrorCode.INVALID_INPUT;
  if (DATABASE_UNAVAILABLE_ERRORS.has(err.name)) return ErrorCode.DATABASE_ERROR;
  return ErrorCode.INTERNAL_ERROR;
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (err: AppError, req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = classify(err);
  const statusCode = err.statusCode ?? errorCodeToStatus[errorCode] ?? 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational ?? false,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Driver messages name hosts; production 5xx messages are never passed through
  let message = err.message || 'An error occurred';
  if (errorCode === ErrorCode.DATABASE_ERROR) {
    message = 'Database unavailable';
  } else if (config.isProduction && statusCode >= 500) {
    message = 'Internal server error';
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 *
 * Every domain rejection travels as an ApiError so the REST layer can render
 * a stable code and message without knowing where it came from.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  readonly isOperational = true;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode ?? errorCodeToStatus[errorCode] ?? 500;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static invalidAmount(message = 'Amount must be greater than 0'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientFunds(balance: string, requested: string): ApiError {
    return new ApiError(
      ErrorCode.INSUFFICIENT_FUNDS,
      `Insufficient funds: available ${balance}, requested ${requested}`
    );
  }

  static notFound(resource: 'account' | 'movement' | 'customer', id: string | number): ApiError {
    const codeMap = {
      account: ErrorCode.ACCOUNT_NOT_FOUND,
      movement: ErrorCode.MOVEMENT_NOT_FOUND,
      customer: ErrorCode.CUSTOMER_NOT_FOUND,
    } as const;
    const label = resource.charAt(0).toUpperCase() + resource.slice(1);
    return new ApiError(codeMap[resource], `${label} not found: ${id}`);
  }

  static accountNotActive(accountNumber: number): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_NOT_ACTIVE, `Account ${accountNumber} is not active`);
  }

  static customerNotActive(customerId: string): ApiError {
    return new ApiError(ErrorCode.CUSTOMER_NOT_ACTIVE, `Customer ${customerId} is not active`);
  }

  static customerUnavailable(reason: string): ApiError {
    return new ApiError(ErrorCode.CUSTOMER_SERVICE_UNAVAILABLE, `Customer validation failed: ${reason}`);
  }

  static accountLimitReached(customerId: string, limit: number): ApiError {
    return new ApiError(
      ErrorCode.ACCOUNT_LIMIT_REACHED,
      `Customer ${customerId} already has the maximum of ${limit} active accounts`
    );
  }

  static duplicateCategory(customerId: string, category: string): ApiError {
    return new ApiError(
      ErrorCode.DUPLICATE_ACCOUNT_CATEGORY,
      `Customer ${customerId} already has an active ${category} account`
    );
  }

  static accountHasBalance(accountNumber: number, balance: string): ApiError {
    return new ApiError(
      ErrorCode.ACCOUNT_HAS_BALANCE,
      `Account ${accountNumber} cannot be deleted with a non-zero balance: ${balance}`
    );
  }

  static alreadyReversed(movementId: string): ApiError {
    return new ApiError(ErrorCode.MOVEMENT_ALREADY_REVERSED, `Movement ${movementId} has already been reversed`);
  }

  static idempotencyConflict(message: string): ApiError {
    return new ApiError(ErrorCode.IDEMPOTENCY_CONFLICT, message);
  }

  static concurrentModification(accountNumber: number, attempts: number): ApiError {
    return new ApiError(
      ErrorCode.CONCURRENT_MODIFICATION,
      `Account ${accountNumber} was modified concurrently; gave up after ${attempts} attempts`
    );
  }
}
