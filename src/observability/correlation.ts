import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

const firstHeader = (value: string | string[] | undefined): string | undefined => {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value && value.length > 0 ? value : undefined;
};

/**
 * Correlation ID middleware
 * - Extracts or generates a correlation ID for each request
 * - Keeps the caller's x-request-id separately so movements can record both
 * - Stores them in AsyncLocalStorage for access throughout the request lifecycle
 * - Adds correlation ID to response headers
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = firstHeader(req.headers['x-request-id']);
  const correlationId = firstHeader(req.headers['x-correlation-id']) || requestId || uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
    requestId,
  };

  asyncLocalStorage.run(context, () => {
    logger.info(
      {
        correlationId,
        method: req.method,
        path: req.path,
        userAgent: req.headers['user-agent'],
      },
      'Request started'
    );

    res.on('finish', () => {
      logger.info(
        {
          correlationId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
        },
        'Request completed'
      );
    });

    next();
  });
};
