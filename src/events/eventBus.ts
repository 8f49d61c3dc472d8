import Redis, { RedisOptions } from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability/logger';
import { EventEnvelope, EventHandler, EventHeaders } from '../types/events';

const log = createServiceLogger('event-bus');

/**
 * Anything envelopes can be handed to. The Redis bus in production, a stub in tests.
 */
export interface EventSink {
  publish(envelope: EventEnvelope): Promise<void>;
}

export interface EventSubscriber {
  subscribe(topic: string, handler: EventHandler): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
}

/**
 * Rebuild an envelope from a channel message. Producers that publish a bare
 * JSON body (no envelope) get one synthesised from the channel and body.
 * Arrival time is never taken as the event time.
 */
export const decodeEnvelope = (channel: string, message: string): EventEnvelope => {
  const parsed: unknown = JSON.parse(message);

  if (typeof parsed === 'object' && parsed !== null && 'headers' in parsed && 'body' in parsed) {
    const headers: unknown = parsed.headers;
    const key: unknown = 'key' in parsed ? parsed.key : undefined;
    if (typeof headers === 'object' && headers !== null) {
      const timestamp: unknown = 'timestamp' in headers ? headers.timestamp : undefined;
      const eventType: unknown = 'eventType' in headers ? headers.eventType : undefined;
      const correlationId: unknown = 'correlationId' in headers ? headers.correlationId : undefined;
      const decoded: EventHeaders = {
        eventType: typeof eventType === 'string' ? eventType : '',
      };
      if (typeof timestamp === 'string') {
        decoded.timestamp = timestamp;
      }
      if (typeof correlationId === 'string') {
        decoded.correlationId = correlationId;
      }
      return {
        topic: channel,
        key: typeof key === 'string' || typeof key === 'number' ? String(key) : '',
        headers: decoded,
        body: parsed.body,
      };
    }
  }

  const bareType: unknown =
    typeof parsed === 'object' && parsed !== null && 'eventType' in parsed ? parsed.eventType : undefined;
  return {
    topic: channel,
    key: '',
    headers: {
      eventType: typeof bareType === 'string' ? bareType : '',
    },
    body: parsed,
  };
};

const waitForConnect = (client: Redis): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    client.once('connect', () => resolve());
    client.once('error', (err: Error) => reject(err));
  });

/**
 * Redis pub/sub transport. One channel per topic; handlers are kept per topic
 * and run in registration order for each message.
 */
export class EventBus implements EventSink, EventSubscriber {
  private publisher: Redis | null = null;
  private subscriber: Redis | null = null;
  private handlers: Map<string, EventHandler[]> = new Map();
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const redisConfig: RedisOptions = {
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    };

    const publisher = new Redis(redisConfig);
    const subscriber = new Redis(redisConfig);
    this.publisher = publisher;
    this.subscriber = subscriber;

    await Promise.all([waitForConnect(publisher), waitForConnect(subscriber)]);

    for (const client of [publisher, subscriber]) {
      client.on('error', (err: Error) => log.error({ err }, 'Redis connection error'));
    }

    subscriber.on('message', (channel: string, message: string) => {
      this.dispatch(channel, message).catch((error: unknown) => {
        log.error({ err: error, channel }, 'Event dispatch failed');
      });
    });

    this.isConnected = true;
    log.info({ host: config.redis.host, port: config.redis.port }, 'Event bus connected to Redis');
  }

  private async dispatch(channel: string, message: string): Promise<void> {
    let envelope: EventEnvelope;
    try {
      envelope = decodeEnvelope(channel, message);
    } catch (error) {
      log.error({ err: error, channel }, 'Error parsing event message');
      return;
    }

    const handlers = this.handlers.get(channel) || [];
    for (const handler of handlers) {
      try {
        await handler(envelope);
      } catch (error) {
        log.error({ err: error, channel, eventType: envelope.headers.eventType }, 'Error handling event');
      }
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }

    this.handlers.clear();
    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(envelope: EventEnvelope): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    await this.publisher.publish(envelope.topic, JSON.stringify(envelope));
    log.debug({ topic: envelope.topic, key: envelope.key, eventType: envelope.headers.eventType }, 'Event published');
  }

  async subscribe(topic: string, handler: EventHandler): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    const handlers = this.handlers.get(topic) || [];
    handlers.push(handler);
    this.handlers.set(topic, handlers);

    await this.subscriber.subscribe(topic);
    log.info({ topic }, 'Subscribed to topic');
  }

  async unsubscribe(topic: string): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      return;
    }

    this.handlers.delete(topic);
    await this.subscriber.unsubscribe(topic);
    log.info({ topic }, 'Unsubscribed from topic');
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export const eventBus = new EventBus();
