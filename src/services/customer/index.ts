export { HttpCustomerClient, CustomerDirectory, CustomerLookup, CustomerClientOptions } from './customer.client';
export {
  CustomerProjectionCache,
  CustomerProjection,
  CustomerStatus,
  CustomerEventOutcome,
  CustomerLifecycleHooks,
  ConfirmedCustomer,
} from './customer.cache';
export {
  CircuitBreaker,
  CircuitBreakerOptions,
  CircuitState,
  ResilientCustomerDirectory,
  RetryOptions,
  isCustomerServiceUnavailable,
} from './customer.resilience';
export {
  handleCustomerEnvelope,
  registerCustomerEventHandlers,
  unregisterCustomerEventHandlers,
} from './customer.events';
