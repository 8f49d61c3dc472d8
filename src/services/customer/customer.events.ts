/**
 * Customer Event Handlers
 *
 * Consumes the customer lifecycle topic and feeds the projection cache.
 * Each message is handled inside its own log context so the cascade it may
 * trigger carries the producer's correlation id.
 */

import { EventSubscriber } from '../../events/eventBus';
import { createServiceLogger } from '../../observability/logger';
import { runWithContext } from '../../observability/log-context';
import { customerEventsTotal } from '../../observability/metrics';
import { EventEnvelope, parseCustomerEvent } from '../../types/events';

import { CustomerEventOutcome, CustomerProjectionCache } from './customer.cache';

const log = createServiceLogger('customer-events');

/**
 * Handle one envelope from the customer topic. Returns null when the message
 * is not an applicable customer event.
 */
export const handleCustomerEnvelope = async (
  cache: CustomerProjectionCache,
  envelope: EventEnvelope
): Promise<CustomerEventOutcome | null> => {
  const event = parseCustomerEvent(envelope);
  if (!event) {
    customerEventsTotal.inc({ type: envelope.headers.eventType || 'unknown', outcome: 'invalid' });
    log.warn({ topic: envelope.topic, key: envelope.key, eventType: envelope.headers.eventType }, 'Unusable customer event skipped');
    return null;
  }

  const correlationId = envelope.headers.correlationId ?? event.eventId;
  return runWithContext({ correlationId }, () => cache.onCustomerEvent(event));
};

export async function registerCustomerEventHandlers(
  bus: EventSubscriber,
  cache: CustomerProjectionCache,
  topic: string
): Promise<void> {
  try {
    await bus.subscribe(topic, async (envelope) => {
      await handleCustomerEnvelope(cache, envelope);
    });
    log.info({ topic }, 'Customer event handlers registered');
  } catch (error) {
    log.error({ err: error, topic }, 'Failed to register customer event handlers');
    throw error;
  }
}

export async function unregisterCustomerEventHandlers(bus: EventSubscriber, topic: string): Promise<void> {
  try {
    await bus.unsubscribe(topic);
    log.info({ topic }, 'Customer event handlers unregistered');
  } catch (error) {
    log.error({ err: error, topic }, 'Failed to unregister customer event handlers');
  }
}
