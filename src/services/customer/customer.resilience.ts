/**
 * Customer lookup resilience
 *
 * Retry and a circuit breaker around a CustomerDirectory. Only a
 * CUSTOMER_SERVICE_UNAVAILABLE error counts as a failure; found and
 * not_found answers are successes.
 *
 * The breaker keeps the outcome of the last windowSize calls. With at least
 * minimumCalls recorded and the failure rate at or above the threshold it
 * opens and rejects lookups without calling out. After openMs it half-opens
 * and admits halfOpenCalls trial calls: if all succeed it closes, the first
 * failure opens it again.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { customerCircuitState, customerLookupRetriesTotal } from '../../observability/metrics';
import { ErrorCode } from '../../types/errors';

import { CustomerDirectory, CustomerLookup } from './customer.client';

const log = createServiceLogger('customer-resilience');

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const STATE_GAUGE: Record<CircuitState, number> = {
  [CircuitState.CLOSED]: 0,
  [CircuitState.OPEN]: 1,
  [CircuitState.HALF_OPEN]: 2,
};

export interface CircuitBreakerOptions {
  windowSize: number;
  minimumCalls: number;
  /** Percent of failed calls in the window that opens the circuit */
  failureRateThreshold: number;
  openMs: number;
  halfOpenCalls: number;
}

export interface RetryOptions {
  /** Total attempts, the first one included */
  maxAttempts: number;
  waitMs: number;
}

export const isCustomerServiceUnavailable = (error: unknown): boolean =>
  error instanceof ApiError && error.errorCode === ErrorCode.CUSTOMER_SERVICE_UNAVAILABLE;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class CircuitBreaker {
  private state = CircuitState.CLOSED;
  /** true marks a failed call */
  private window: boolean[] = [];
  private openedAt = 0;
  private trialsAdmitted = 0;
  private trialsSucceeded = 0;

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number = Date.now
  ) {
    customerCircuitState.set(STATE_GAUGE[this.state]);
  }

  get currentState(): CircuitState {
    this.refresh();
    return this.state;
  }

  /**
   * @throws ApiError CUSTOMER_SERVICE_UNAVAILABLE without calling fn while open
   */
  async execute<T>(fn: () => Promise<T>, isFailure: (error: unknown) => boolean): Promise<T> {
    this.refresh();
    if (
      this.state === CircuitState.OPEN ||
      (this.state === CircuitState.HALF_OPEN && this.trialsAdmitted >= this.options.halfOpenCalls)
    ) {
      throw ApiError.customerUnavailable('circuit breaker is open');
    }

    const trial = this.state === CircuitState.HALF_OPEN;
    if (trial) {
      this.trialsAdmitted++;
    }

    try {
      const result = await fn();
      this.record(false, trial);
      return result;
    } catch (error) {
      if (isFailure(error)) {
        this.record(true, trial);
      } else if (trial) {
        this.trialsAdmitted--;
      }
      throw error;
    }
  }

  private record(failed: boolean, trial: boolean): void {
    if (trial) {
      if (this.state !== CircuitState.HALF_OPEN) {
        return;
      }
      if (failed) {
        this.transition(CircuitState.OPEN);
      } else if (++this.trialsSucceeded >= this.options.halfOpenCalls) {
        this.transition(CircuitState.CLOSED);
      }
      return;
    }

    // Calls admitted before the circuit opened do not count against the next window
    if (this.state !== CircuitState.CLOSED) {
      return;
    }
    this.window.push(failed);
    if (this.window.length > this.options.windowSize) {
      this.window.shift();
    }

    const failures = this.window.filter(Boolean).length;
    if (
      this.window.length >= this.options.minimumCalls &&
      failures * 100 >= this.options.failureRateThreshold * this.window.length
    ) {
      this.transition(CircuitState.OPEN);
    }
  }

  private refresh(): void {
    if (this.state === CircuitState.OPEN && this.now() - this.openedAt >= this.options.openMs) {
      this.transition(CircuitState.HALF_OPEN);
    }
  }

  private transition(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.window = [];
    this.trialsAdmitted = 0;
    this.trialsSucceeded = 0;
    if (next === CircuitState.OPEN) {
      this.openedAt = this.now();
    }
    customerCircuitState.set(STATE_GAUGE[next]);

    const level = next === CircuitState.OPEN ? 'warn' : 'info';
    log[level]({ from: previous, to: next }, 'Customer service circuit state changed');
  }
}

export class ResilientCustomerDirectory implements CustomerDirectory {
  constructor(
    private readonly inner: CustomerDirectory,
    private readonly breaker: CircuitBreaker,
    private readonly retry: RetryOptions,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async lookup(customerId: string): Promise<CustomerLookup> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.breaker.execute(() => this.inner.lookup(customerId), isCustomerServiceUnavailable);
      } catch (error) {
        if (
          !isCustomerServiceUnavailable(error) ||
          attempt >= this.retry.maxAttempts ||
          this.breaker.currentState === CircuitState.OPEN
        ) {
          throw error;
        }
        customerLookupRetriesTotal.inc();
        log.warn({ customerId, attempt }, 'Customer service unavailable; retrying lookup');
        if (this.retry.waitMs > 0) {
          await this.wait(this.retry.waitMs);
        }
      }
    }
  }
}
