// Logger exports
export { logger, createServiceLogger, Logger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getRequestId,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  movementsTotal,
  movementRetriesTotal,
  movementAmount,
  activeMovements,
  accountsCreatedTotal,
  accountsDeletedTotal,
  eventsPublishedTotal,
  customerEventsTotal,
  customerCacheLookupsTotal,
  customerServiceCallDuration,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export { initTracing, shutdownTracing, getTracer, traceLedgerOperation } from './tracing';
