/**
 * Customer projection cache
 *
 * Local, eventually-consistent view of remote customer state. Fed by the
 * customer lifecycle stream and seeded by live lookups on a miss.
 *
 * Recency rules:
 * - an event applies only when its timestamp is strictly newer than the entry's
 * - an event whose id matches the entry's last event id is a duplicate
 * - a lookup result is stamped with the time the lookup started and is only
 *   written when the entry is not newer than that
 * - a deletion cascades once, even when its event arrives after a lookup
 *   already recorded the customer as gone
 *
 * All writes for one customer go through a per-key promise chain, so the
 * compare and the write can never interleave with another writer.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { customerCacheLookupsTotal, customerEventsTotal } from '../../observability/metrics';
import { CustomerEvent, EventType } from '../../types/events';

import { CustomerDirectory, CustomerLookup } from './customer.client';

const log = createServiceLogger('customer-cache');

export type CustomerStatus = 'active' | 'inactive' | 'unknown';

export type CustomerEventOutcome = 'applied' | 'stale' | 'duplicate';

export interface CustomerProjection {
  customerId: string;
  name?: string;
  active: boolean;
  deleted: boolean;
  lastEventAt: Date;
  lastEventId?: string;
  source: 'event' | 'lookup';
  cascadedAt?: Date;
}

interface EventDecision {
  outcome: CustomerEventOutcome;
  cascade: boolean;
}

export interface ConfirmedCustomer {
  customerId: string;
  name: string;
}

/**
 * Reactions to applied lifecycle events. Bound after construction because the
 * account service that implements them depends on this cache.
 */
export interface CustomerLifecycleHooks {
  onCreated(event: CustomerEvent): Promise<void>;
  onDeleted(event: CustomerEvent): Promise<void>;
}

export class CustomerProjectionCache {
  private entries = new Map<string, CustomerProjection>();
  private queues = new Map<string, Promise<void>>();
  private hooks: CustomerLifecycleHooks | null = null;

  constructor(
    private readonly directory: CustomerDirectory,
    private readonly now: () => Date = () => new Date()
  ) {}

  setLifecycleHooks(hooks: CustomerLifecycleHooks): void {
    this.hooks = hooks;
  }

  /**
   * Pure cache read; never calls the customer service.
   */
  isCustomerActive(customerId: string): CustomerStatus {
    const entry = this.entries.get(customerId);
    if (!entry) {
      return 'unknown';
    }
    return entry.active && !entry.deleted ? 'active' : 'inactive';
  }

  get(customerId: string): CustomerProjection | undefined {
    const entry = this.entries.get(customerId);
    return entry ? { ...entry } : undefined;
  }

  /**
   * Cache first; on a miss, one live lookup that seeds the cache.
   */
  async ensureCustomerActive(customerId: string): Promise<void> {
    const status = this.isCustomerActive(customerId);
    customerCacheLookupsTotal.inc({ result: status === 'unknown' ? 'miss' : 'hit' });

    if (status === 'active') {
      return;
    }
    if (status === 'inactive') {
      throw ApiError.customerNotActive(customerId);
    }

    const result = await this.lookupAndRecord(customerId);
    if (result.status === 'not_found') {
      throw ApiError.notFound('customer', customerId);
    }
    if (!result.active) {
      throw ApiError.customerNotActive(customerId);
    }
  }

  /**
   * Always asks the customer service. Used where existence must not be taken
   * from the cache (opening an account).
   */
  async confirmCustomer(customerId: string): Promise<ConfirmedCustomer> {
    const result = await this.lookupAndRecord(customerId);
    if (result.status === 'not_found') {
      throw ApiError.notFound('customer', customerId);
    }
    if (!result.active) {
      throw ApiError.customerNotActive(customerId);
    }
    return {
      customerId,
      name: result.name ?? this.entries.get(customerId)?.name ?? '',
    };
  }

  async onCustomerEvent(event: CustomerEvent): Promise<CustomerEventOutcome> {
    const { outcome, cascade } = await this.withKey(event.customerId, () => this.applyEvent(event));
    customerEventsTotal.inc({ type: event.eventType, outcome });

    if (outcome === 'applied') {
      log.info({ customerId: event.customerId, eventId: event.eventId, eventType: event.eventType }, 'Customer event applied');
    } else {
      log.info(
        { customerId: event.customerId, eventId: event.eventId, eventType: event.eventType, outcome, cascade },
        'Customer event ignored'
      );
    }

    if (this.hooks) {
      if (cascade) {
        await this.hooks.onDeleted(event);
      } else if (outcome === 'applied' && event.eventType === EventType.CUSTOMER_CREATED) {
        await this.hooks.onCreated(event);
      }
    }

    return outcome;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private applyEvent(event: CustomerEvent): EventDecision {
    const existing = this.entries.get(event.customerId);
    const deletion = event.eventType === EventType.CUSTOMER_DELETED;

    if (existing?.lastEventId === event.eventId) {
      return { outcome: 'duplicate', cascade: false };
    }
    if (existing && event.occurredAt.getTime() <= existing.lastEventAt.getTime()) {
      // A newer lookup may have seen the customer gone before this event arrived
      const cascade = deletion && existing.deleted && !existing.cascadedAt;
      if (cascade) {
        existing.cascadedAt = this.now();
      }
      return { outcome: 'stale', cascade };
    }

    const cascade = deletion && !existing?.cascadedAt;
    this.entries.set(event.customerId, {
      customerId: event.customerId,
      name: event.name ?? existing?.name,
      active: event.active,
      deleted: deletion,
      lastEventAt: event.occurredAt,
      lastEventId: event.eventId,
      source: 'event',
      cascadedAt: deletion ? existing?.cascadedAt ?? this.now() : undefined,
    });
    return { outcome: 'applied', cascade };
  }

  private async lookupAndRecord(customerId: string): Promise<CustomerLookup> {
    const startedAt = this.now();
    const result = await this.directory.lookup(customerId);

    await this.withKey(customerId, () => {
      const existing = this.entries.get(customerId);
      if (existing && existing.lastEventAt.getTime() > startedAt.getTime()) {
        log.debug({ customerId }, 'Lookup result older than cached entry; not recorded');
        return;
      }
      this.entries.set(customerId, {
        customerId,
        name: result.status === 'found' ? result.name ?? existing?.name : existing?.name,
        active: result.status === 'found' && result.active,
        deleted: result.status === 'not_found',
        lastEventAt: startedAt,
        lastEventId: existing?.lastEventId,
        source: 'lookup',
        cascadedAt: result.status === 'not_found' ? existing?.cascadedAt : undefined,
      });
    });

    return result;
  }

  /**
   * Run fn after every earlier write for the same customer has settled.
   */
  private withKey<T>(customerId: string, fn: () => T): Promise<T> {
    const previous = this.queues.get(customerId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The chain only orders writers; run's own rejection still reaches the caller
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .finally(() => {
        if (this.queues.get(customerId) === tail) {
          this.queues.delete(customerId);
        }
      });
    this.queues.set(customerId, tail);
    return run;
  }
}
