import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Movement outcomes: applied, replayed, rejected
 */
export const movementsTotal = new Counter({
  name: 'ledger_movements_total',
  help: 'Movement requests by kind and outcome',
  labelNames: ['kind', 'outcome'] as const,
  registers: [registry],
});

/**
 * Optimistic-lock retries (account version changed between read and write)
 */
export const movementRetriesTotal = new Counter({
  name: 'ledger_movement_retries_total',
  help: 'Movement attempts retried after a version conflict',
  registers: [registry],
});

export const movementAmount = new Histogram({
  name: 'ledger_movement_amount',
  help: 'Applied movement amounts in major units',
  labelNames: ['kind'] as const,
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000, 100000],
  registers: [registry],
});

export const activeMovements = new Gauge({
  name: 'ledger_active_movements',
  help: 'Movements currently being applied',
  registers: [registry],
});

export const accountsCreatedTotal = new Counter({
  name: 'ledger_accounts_created_total',
  help: 'Accounts opened by source',
  labelNames: ['source'] as const, // command, customer_event
  registers: [registry],
});

export const accountsDeletedTotal = new Counter({
  name: 'ledger_accounts_deleted_total',
  help: 'Accounts deleted by mode',
  labelNames: ['mode'] as const, // soft, hard, cascade
  registers: [registry],
});

// ============================================
// Event Metrics
// ============================================

/**
 * Publish attempts by topic and outcome. A rising failure count is the only
 * signal that fire-and-forget delivery is systematically broken.
 */
export const eventsPublishedTotal = new Counter({
  name: 'ledger_events_published_total',
  help: 'Domain event publish attempts by topic and outcome',
  labelNames: ['topic', 'outcome'] as const, // success, serialization_error, send_error
  registers: [registry],
});

export const customerEventsTotal = new Counter({
  name: 'ledger_customer_events_total',
  help: 'Customer lifecycle events consumed by type and outcome',
  labelNames: ['type', 'outcome'] as const, // applied, stale, duplicate, invalid
  registers: [registry],
});

// ============================================
// Customer Projection Metrics
// ============================================

export const customerCacheLookupsTotal = new Counter({
  name: 'ledger_customer_cache_lookups_total',
  help: 'Customer projection reads by result',
  labelNames: ['result'] as const, // hit, miss
  registers: [registry],
});

export const customerServiceCallDuration = new Histogram({
  name: 'ledger_customer_service_call_duration_seconds',
  help: 'Synchronous customer service lookup duration in seconds',
  labelNames: ['outcome'] as const, // found, not_found, unavailable
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 3, 5],
  registers: [registry],
});

export const customerLookupRetriesTotal = new Counter({
  name: 'ledger_customer_lookup_retries_total',
  help: 'Customer service lookups retried after an unavailable answer',
  registers: [registry],
});

export const customerCircuitState = new Gauge({
  name: 'ledger_customer_circuit_state',
  help: 'Customer service circuit breaker state (0 closed, 1 open, 2 half open)',
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
