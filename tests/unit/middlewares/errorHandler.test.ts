/**
 * Error Handler Middleware Unit Tests
 */

import { Request, Response, NextFunction } from 'express';

import { ApiError, errorHandler, notFoundHandler } from '../../../src/middlewares/errorHandler';
import { runWithContext } from '../../../src/observability/log-context';
import { ErrorCode } from '../../../src/types/errors';

const createResponse = () => {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

describe('Error Handler', () => {
  const req = { path: '/movements', method: 'POST' } as Request;
  const next: NextFunction = jest.fn();

  describe('ApiError', () => {
    it('should map error codes to HTTP statuses', () => {
      expect(ApiError.insufficientFunds('1.00', '2.00').statusCode).toBe(422);
      expect(ApiError.notFound('movement', 'm-1').statusCode).toBe(404);
      expect(ApiError.idempotencyConflict('conflict').statusCode).toBe(409);
      expect(ApiError.concurrentModification(1, 4).statusCode).toBe(409);
      expect(ApiError.customerUnavailable('down').statusCode).toBe(503);
    });

    it('should name the resource in not-found messages', () => {
      expect(ApiError.notFound('customer', 'cust-1').message).toBe('Customer not found: cust-1');
      expect(ApiError.notFound('account', 12).errorCode).toBe(ErrorCode.ACCOUNT_NOT_FOUND);
    });
  });

  describe('errorHandler', () => {
    it('should render an ApiError with its code and correlation id', () => {
      const res = createResponse();

      runWithContext({ correlationId: 'corr-1' }, () => {
        errorHandler(ApiError.alreadyReversed('m-1'), req, res as unknown as Response, next);
      });

      expect(res.status).toHaveBeenCalledWith(409);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        error: {
          code: ErrorCode.MOVEMENT_ALREADY_REVERSED,
          message: 'Movement m-1 has already been reversed',
          timestamp: expect.any(String),
          correlationId: 'corr-1',
        },
      });
    });

    it('should include validation details', () => {
      const res = createResponse();

      errorHandler(
        ApiError.validationError('Validation failed', { amount: ['Amount is required'] }),
        req,
        res as unknown as Response,
        next
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json.mock.calls[0][0].error.details).toEqual({ amount: ['Amount is required'] });
      expect(res.json.mock.calls[0][0].error.correlationId).toBe('unknown');
    });

    it('should treat unknown errors as internal', () => {
      const res = createResponse();

      errorHandler(new Error('boom'), req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json.mock.calls[0][0].error.code).toBe(ErrorCode.INTERNAL_ERROR);
    });

    it('should answer 503 while the database cannot be reached', () => {
      const res = createResponse();
      const driverError = new Error('connect ECONNREFUSED 10.0.0.5:27017');
      driverError.name = 'MongoServerSelectionError';

      errorHandler(driverError, req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json.mock.calls[0][0].error.code).toBe(ErrorCode.DATABASE_ERROR);
      expect(res.json.mock.calls[0][0].error.message).toBe('Database unavailable');
    });

    it('should answer malformed JSON bodies with 400', () => {
      const res = createResponse();
      const syntaxError = Object.assign(new SyntaxError('Unexpected token'), { statusCode: 400 });

      errorHandler(syntaxError, req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json.mock.calls[0][0].error.code).toBe(ErrorCode.INVALID_INPUT);
    });
  });

  describe('notFoundHandler', () => {
    it('should describe the unmatched route', () => {
      const res = createResponse();

      notFoundHandler({ path: '/nope', method: 'GET' } as Request, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json.mock.calls[0][0].error.message).toBe('Route GET /nope not found');
    });
  });
});
