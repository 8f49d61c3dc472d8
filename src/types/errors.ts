/**
 * Error Codes for the Ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Business errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  ACCOUNT_NOT_FOUND = 3002,
  MOVEMENT_NOT_FOUND = 3003,
  CUSTOMER_NOT_FOUND = 3004,
  RESOURCE_NOT_FOUND = 3005,
  ACCOUNT_NOT_ACTIVE = 3006,
  CUSTOMER_NOT_ACTIVE = 3007,
  MOVEMENT_ALREADY_REVERSED = 3008,
  ACCOUNT_LIMIT_REACHED = 3009,
  DUPLICATE_ACCOUNT_CATEGORY = 3010,
  ACCOUNT_HAS_BALANCE = 3011,
  IDEMPOTENCY_CONFLICT = 3012,
  CONCURRENT_MODIFICATION = 3013,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  CUSTOMER_SERVICE_UNAVAILABLE = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Business errors -> 404/409/422
  [ErrorCode.INSUFFICIENT_FUNDS]: 422,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.MOVEMENT_NOT_FOUND]: 404,
  [ErrorCode.CUSTOMER_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_NOT_ACTIVE]: 422,
  [ErrorCode.CUSTOMER_NOT_ACTIVE]: 422,
  [ErrorCode.MOVEMENT_ALREADY_REVERSED]: 409,
  [ErrorCode.ACCOUNT_LIMIT_REACHED]: 422,
  [ErrorCode.DUPLICATE_ACCOUNT_CATEGORY]: 409,
  [ErrorCode.ACCOUNT_HAS_BALANCE]: 422,
  [ErrorCode.IDEMPOTENCY_CONFLICT]: 409,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.CUSTOMER_SERVICE_UNAVAILABLE]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

/**
 * API Response type
 */
export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
