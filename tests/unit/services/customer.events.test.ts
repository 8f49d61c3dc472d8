/**
 * Customer Event Handler Unit Tests
 */

import { EventSubscriber } from '../../../src/events/eventBus';
import { getCorrelationId } from '../../../src/observability/log-context';
import { CustomerProjectionCache } from '../../../src/services/customer/customer.cache';
import {
  handleCustomerEnvelope,
  registerCustomerEventHandlers,
  unregisterCustomerEventHandlers,
} from '../../../src/services/customer/customer.events';
import { EventEnvelope, EventHandler } from '../../../src/types/events';
import { StubCustomerDirectory } from '../../helpers/testLedger';

const TOPIC = 'banking.customer.events';

const envelope = (body: unknown, correlationId?: string): EventEnvelope => ({
  topic: TOPIC,
  key: 'cust-1',
  headers: { timestamp: '2024-03-01T10:00:00.000Z', eventType: 'customer.created', correlationId },
  body,
});

class FakeSubscriber implements EventSubscriber {
  handlers = new Map<string, EventHandler>();
  failure: Error | null = null;

  async subscribe(topic: string, handler: EventHandler): Promise<void> {
    if (this.failure) throw this.failure;
    this.handlers.set(topic, handler);
  }

  async unsubscribe(topic: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.handlers.delete(topic);
  }
}

describe('Customer Event Handlers', () => {
  let cache: CustomerProjectionCache;

  beforeEach(() => {
    cache = new CustomerProjectionCache(new StubCustomerDirectory());
  });

  describe('handleCustomerEnvelope', () => {
    it('should apply a valid event to the cache', async () => {
      await expect(handleCustomerEnvelope(cache, envelope({ eventId: 'evt-1', name: 'Ada' }))).resolves.toBe('applied');
      expect(cache.isCustomerActive('cust-1')).toBe('active');
    });

    it('should skip unusable messages', async () => {
      await expect(handleCustomerEnvelope(cache, envelope({ name: 'no id' }))).resolves.toBeNull();
      expect(cache.size()).toBe(0);
    });

    it('should run hooks under the producer correlation id', async () => {
      const seen: Array<string | undefined> = [];
      cache.setLifecycleHooks({
        onCreated: async () => {
          seen.push(getCorrelationId());
        },
        onDeleted: async () => undefined,
      });

      await handleCustomerEnvelope(cache, envelope({ eventId: 'evt-1' }, 'corr-42'));
      await handleCustomerEnvelope(cache, {
        ...envelope({ eventId: 'evt-2', occurredAt: '2024-03-01T11:00:00.000Z' }),
        key: 'cust-2',
      });

      expect(seen).toEqual(['corr-42', 'evt-2']);
    });
  });

  describe('register / unregister', () => {
    it('should route topic messages into the cache', async () => {
      const bus = new FakeSubscriber();
      await registerCustomerEventHandlers(bus, cache, TOPIC);

      const handler = bus.handlers.get(TOPIC);
      expect(handler).toBeDefined();
      await handler?.(envelope({ eventId: 'evt-1' }));

      expect(cache.isCustomerActive('cust-1')).toBe('active');

      await unregisterCustomerEventHandlers(bus, TOPIC);
      expect(bus.handlers.has(TOPIC)).toBe(false);
    });

    it('should rethrow subscription failures', async () => {
      const bus = new FakeSubscriber();
      bus.failure = new Error('Event bus not connected');

      await expect(registerCustomerEventHandlers(bus, cache, TOPIC)).rejects.toThrow('Event bus not connected');
    });

    it('should log and continue when unsubscribe fails', async () => {
      const bus = new FakeSubscriber();
      bus.failure = new Error('connection reset');

      await expect(unregisterCustomerEventHandlers(bus, TOPIC)).resolves.toBeUndefined();
    });
  });
});
