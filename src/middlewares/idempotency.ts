/**
 * Idempotency Key Middleware
 *
 * Movements are deduplicated inside the ledger by transaction id and an
 * optional idempotency key. Clients may send the key in the
 * X-Idempotency-Key header instead of the request body.
 */

import { Request, Response, NextFunction } from 'express';

import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Read the idempotency key from the header, falling back to the body field
 */
export const readIdempotencyKey = (req: Request): string | undefined => {
  const header = req.headers['x-idempotency-key'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'idempotencyKey' in body) {
    const value: unknown = body.idempotencyKey;
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
  return undefined;
};

/**
 * Validate idempotency key format
 * Keys should be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const idempotencyKey = readIdempotencyKey(req);

  if (!idempotencyKey) {
    next();
    return;
  }

  if (!KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid idempotency key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
