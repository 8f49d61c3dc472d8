import { AsyncLocalStorage } from 'async_hooks';

/**
 * Log context stored in AsyncLocalStorage
 * Provides request-scoped context for logging and event headers
 */
export interface LogContext {
  correlationId: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * AsyncLocalStorage instance for maintaining request context
 * across async operations without explicit parameter passing
 */
export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Get the current correlation ID from the async context
 */
export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

/**
 * Get the current request ID from the async context
 */
export const getRequestId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.requestId;
};

/**
 * Run a function within a specific log context
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
