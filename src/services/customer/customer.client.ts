import axios from 'axios';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { getCorrelationId } from '../../observability/log-context';
import { customerServiceCallDuration } from '../../observability/metrics';

const log = createServiceLogger('customer-client');

export type CustomerLookup =
  | { status: 'found'; customerId: string; name?: string; active: boolean }
  | { status: 'not_found'; customerId: string };

/**
 * Synchronous, timeout-bounded source of truth for customer existence.
 * Implementations throw CUSTOMER_SERVICE_UNAVAILABLE instead of guessing.
 */
export interface CustomerDirectory {
  lookup(customerId: string): Promise<CustomerLookup>;
}

export interface CustomerClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const describeFailure = (error: unknown, timeoutMs: number): string => {
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return `customer service timed out after ${timeoutMs}ms`;
    }
    if (error.response) {
      return `customer service responded ${error.response.status}`;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : 'unknown error';
};

/**
 * GET {baseUrl}/api/v1/customers/:id/validate
 *
 * 200 → found (body `state`/`active` decides, absent means active)
 * 400 → found but inactive
 * 404 → not found
 */
export class HttpCustomerClient implements CustomerDirectory {
  constructor(private readonly options: CustomerClientOptions) {}

  async lookup(customerId: string): Promise<CustomerLookup> {
    const url = `${this.options.baseUrl}/api/v1/customers/${encodeURIComponent(customerId)}/validate`;
    const endTimer = customerServiceCallDuration.startTimer();
    const correlationId = getCorrelationId();

    try {
      const response = await axios.get<unknown>(url, {
        timeout: this.options.timeoutMs,
        headers: {
          Accept: 'application/json',
          ...(correlationId && { 'x-correlation-id': correlationId }),
        },
        validateStatus: (status) => status === 200 || status === 400 || status === 404,
      });

      if (response.status === 404) {
        endTimer({ outcome: 'not_found' });
        log.warn({ customerId }, 'Customer not found in customer service');
        return { status: 'not_found', customerId };
      }

      if (response.status === 400) {
        endTimer({ outcome: 'found' });
        return { status: 'found', customerId, active: false };
      }

      const body = response.data;
      if (typeof body !== 'object' || body === null) {
        throw new Error('malformed customer payload');
      }
      const flag: unknown = 'state' in body ? body.state : 'active' in body ? body.active : undefined;
      const name: unknown = 'name' in body ? body.name : undefined;

      endTimer({ outcome: 'found' });
      log.debug({ customerId, active: flag !== false }, 'Customer validated');
      return {
        status: 'found',
        customerId,
        name: typeof name === 'string' ? name : undefined,
        active: flag !== false,
      };
    } catch (error) {
      endTimer({ outcome: 'unavailable' });
      const reason = describeFailure(error, this.options.timeoutMs);
      log.error({ err: error, customerId, url }, 'Customer lookup failed');
      throw ApiError.customerUnavailable(reason);
    }
  }
}
