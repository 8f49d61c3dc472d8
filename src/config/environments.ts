/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const uri = MONGODB_URI;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const parseIntEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment.
 * Movements are committed in multi-document transactions, so the target must be a replica set.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/ledger?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION (event bus)
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseIntEnv('REDIS_PORT', isTest ? 6380 : 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

export type LedgerStoreDriver = 'mongo' | 'memory';

const parseStoreDriver = (value: string | undefined): LedgerStoreDriver => {
  if (value === 'memory' || value === 'mongo') {
    return value;
  }
  return isTest ? 'memory' : 'mongo';
};

/**
 * Ledger engine settings
 *
 * maxRetries counts retries after the first attempt when the account version moved underneath us.
 */
export const LEDGER_CONFIG = {
  store: parseStoreDriver(process.env.LEDGER_STORE),
  maxRetries: parseIntEnv('MOVEMENT_MAX_RETRIES', 3),
  retryBackoffMs: parseIntEnv('MOVEMENT_RETRY_BACKOFF_MS', isTest ? 0 : 10),
  maxActiveAccountsPerCustomer: parseIntEnv('MAX_ACTIVE_ACCOUNTS', 5),
  openDefaultAccount: process.env.OPEN_DEFAULT_ACCOUNT !== 'false',
};

/**
 * Event bus topics (Redis channels)
 */
export const TOPICS = {
  ACCOUNT_EVENTS: process.env.TOPIC_ACCOUNT_EVENTS || 'banking.account.events',
  MOVEMENT_EVENTS: process.env.TOPIC_MOVEMENT_EVENTS || 'banking.movement.events',
  CUSTOMER_EVENTS: process.env.TOPIC_CUSTOMER_EVENTS || 'banking.customer.events',
} as const;

// =============================================================================
// CUSTOMER SERVICE
// =============================================================================

/**
 * Synchronous customer lookups fail closed once timeoutMs elapses. An
 * unavailable answer is retried once; the breaker opens when half of the last
 * 20 calls failed (at least 5 calls seen) and lets 3 trial calls through
 * after 20s.
 */
export const CUSTOMER_SERVICE_CONFIG = {
  baseUrl: process.env.CUSTOMER_SERVICE_URL || (isProduction ? 'http://customer-service:8080' : 'http://localhost:8080'),
  timeoutMs: parseIntEnv('CUSTOMER_LOOKUP_TIMEOUT_MS', 3000),
  retry: {
    maxAttempts: parseIntEnv('CUSTOMER_LOOKUP_MAX_ATTEMPTS', 2),
    waitMs: parseIntEnv('CUSTOMER_LOOKUP_RETRY_WAIT_MS', 500),
  },
  circuitBreaker: {
    windowSize: parseIntEnv('CUSTOMER_CIRCUIT_WINDOW_SIZE', 20),
    minimumCalls: parseIntEnv('CUSTOMER_CIRCUIT_MINIMUM_CALLS', 5),
    failureRateThreshold: parseIntEnv('CUSTOMER_CIRCUIT_FAILURE_RATE', 50),
    openMs: parseIntEnv('CUSTOMER_CIRCUIT_OPEN_MS', 20_000),
    halfOpenCalls: parseIntEnv('CUSTOMER_CIRCUIT_HALF_OPEN_CALLS', 3),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseIntEnv('PORT', 3000),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter((origin) => origin.length > 0)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

/**
 * OpenTelemetry configuration
 */
export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'ledger-service',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['MONGODB_URI', 'REDIS_HOST', 'CUSTOMER_SERVICE_URL', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables for production: ${missing.join(', ')}`);
  }

  if (LEDGER_CONFIG.store !== 'mongo') {
    throw new Error('LEDGER_STORE=memory is not allowed in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  store: LEDGER_CONFIG.store,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  customerService: CUSTOMER_SERVICE_CONFIG.baseUrl,
});
