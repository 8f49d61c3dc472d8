/**
 * Event Publisher
 *
 * Fire-and-forget emission of domain events. The ledger write that triggered
 * an event has already committed, so a serialization or send failure is
 * logged and counted in ledger_events_published_total, never thrown.
 * Delivery is attempted at most once; consumers must tolerate loss.
 */

import { createServiceLogger } from '../observability/logger';
import { getCorrelationId } from '../observability/log-context';
import { eventsPublishedTotal } from '../observability/metrics';
import { EventEnvelope, EventType } from '../types/events';
import { EventSink } from './eventBus';

const log = createServiceLogger('event-publisher');

export class EventPublisher {
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly sink: EventSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Attempt one delivery. Resolves once the attempt is over, whatever its outcome.
   */
  async publish(
    topic: string,
    partitionKey: string | number,
    eventType: EventType,
    body: unknown,
    correlationId: string | undefined = getCorrelationId()
  ): Promise<void> {
    const envelope: EventEnvelope = {
      topic,
      key: String(partitionKey),
      headers: {
        timestamp: this.now().toISOString(),
        eventType,
        ...(correlationId && { correlationId }),
      },
      body,
    };

    try {
      JSON.stringify(envelope);
    } catch (error) {
      eventsPublishedTotal.inc({ topic, outcome: 'serialization_error' });
      log.error({ err: error, topic, key: envelope.key, eventType }, 'Event could not be serialized; dropped');
      return;
    }

    try {
      await this.sink.publish(envelope);
      eventsPublishedTotal.inc({ topic, outcome: 'success' });
    } catch (error) {
      eventsPublishedTotal.inc({ topic, outcome: 'send_error' });
      log.error({ err: error, topic, key: envelope.key, eventType, correlationId }, 'Event publish failed; dropped');
    }
  }

  /**
   * Schedule a publish without waiting for it. The caller's correlation id is
   * captured now, before the request context goes away.
   */
  emit(topic: string, partitionKey: string | number, eventType: EventType, body: unknown): void {
    const attempt = this.publish(topic, partitionKey, eventType, body, getCorrelationId())
      .catch((error: unknown) => {
        log.error({ err: error, topic }, 'Unexpected publisher failure');
      })
      .finally(() => {
        this.inFlight.delete(attempt);
      });
    this.inFlight.add(attempt);
  }

  /**
   * Wait for every scheduled publish (shutdown and tests)
   */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}
