/**
 * EventBus Unit Tests
 *
 * Tests the Redis pub/sub event bus and envelope decoding.
 */

import { EventEnvelope, EventType } from '../../../src/types/events';

// Mock Redis
const mockOn = jest.fn();
const mockOnce = jest.fn();
const mockQuit = jest.fn().mockResolvedValue('OK');
const mockPublish = jest.fn().mockResolvedValue(1);
const mockSubscribe = jest.fn().mockResolvedValue('OK');
const mockUnsubscribe = jest.fn().mockResolvedValue('OK');

jest.mock('ioredis', () => {
  return jest.fn().mockImplementation(() => ({
    on: mockOn,
    once: mockOnce,
    quit: mockQuit,
    publish: mockPublish,
    subscribe: mockSubscribe,
    unsubscribe: mockUnsubscribe,
  }));
});

// Mock config
jest.mock('../../../src/config', () => ({
  config: {
    redis: {
      host: 'localhost',
      port: 6379,
    },
  },
}));

// Mock logger
const mockLogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
};
jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => mockLogger,
}));

const flushDispatch = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const envelope: EventEnvelope = {
  topic: 'banking.movement.events',
  key: '7',
  headers: { timestamp: '2024-03-01T10:00:00.000Z', eventType: EventType.MOVEMENT_CREATED, correlationId: 'corr-1' },
  body: { movementId: 'm-1', amount: '10.00' },
};

describe('EventBus', () => {
  let eventBus: typeof import('../../../src/events/eventBus').eventBus;
  let decodeEnvelope: typeof import('../../../src/events/eventBus').decodeEnvelope;

  const messageHandler = (): ((channel: string, message: string) => void) => {
    const call = mockOn.mock.calls.find((args) => args[0] === 'message');
    if (!call) {
      throw new Error('message handler not registered');
    }
    return call[1];
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();

    // Simulate immediate connection by calling connect callback
    mockOnce.mockImplementation((event: string, callback: () => void) => {
      if (event === 'connect') {
        setImmediate(() => callback());
      }
    });

    const module = await import('../../../src/events/eventBus');
    eventBus = module.eventBus;
    decodeEnvelope = module.decodeEnvelope;
  });

  afterEach(async () => {
    await eventBus.disconnect();
  });

  describe('connect', () => {
    it('should return connected: false initially', () => {
      expect(eventBus.getStatus()).toEqual({ connected: false });
    });

    it('should connect successfully when Redis connects', async () => {
      await eventBus.connect();
      expect(eventBus.getStatus().connected).toBe(true);
    });

    it('should not reconnect if already connected', async () => {
      await eventBus.connect();
      await eventBus.connect();

      expect(mockOnce.mock.calls.filter((call) => call[0] === 'connect')).toHaveLength(2);
    });

    it('should handle connection errors', async () => {
      mockOnce.mockImplementation((event: string, callback: (err?: Error) => void) => {
        if (event === 'error') {
          setImmediate(() => callback(new Error('Connection refused')));
        }
      });

      await expect(eventBus.connect()).rejects.toThrow('Connection refused');
      expect(eventBus.getStatus().connected).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('should call quit on both publisher and subscriber', async () => {
      await eventBus.connect();
      await eventBus.disconnect();

      expect(mockQuit).toHaveBeenCalledTimes(2);
      expect(eventBus.getStatus().connected).toBe(false);
    });

    it('should handle disconnect when not connected', async () => {
      await eventBus.disconnect();
      expect(mockQuit).not.toHaveBeenCalled();
    });
  });

  describe('publish', () => {
    it('should publish the envelope on its topic channel', async () => {
      await eventBus.connect();

      await eventBus.publish(envelope);

      expect(mockPublish).toHaveBeenCalledWith('banking.movement.events', JSON.stringify(envelope));
    });

    it('should throw when not connected', async () => {
      await expect(eventBus.publish(envelope)).rejects.toThrow('Event bus not connected');
      expect(mockPublish).not.toHaveBeenCalled();
    });
  });

  describe('subscribe', () => {
    it('should subscribe to the topic channel', async () => {
      await eventBus.connect();

      await eventBus.subscribe('banking.customer.events', jest.fn());

      expect(mockSubscribe).toHaveBeenCalledWith('banking.customer.events');
    });

    it('should throw error when not connected', async () => {
      await expect(eventBus.subscribe('banking.customer.events', jest.fn())).rejects.toThrow(
        'Event bus not connected'
      );
    });

    it('should unsubscribe and drop handlers', async () => {
      await eventBus.connect();
      const handler = jest.fn().mockResolvedValue(undefined);
      await eventBus.subscribe('banking.customer.events', handler);
      await eventBus.unsubscribe('banking.customer.events');

      messageHandler()('banking.customer.events', JSON.stringify(envelope));
      await flushDispatch();

      expect(mockUnsubscribe).toHaveBeenCalledWith('banking.customer.events');
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('message handling', () => {
    it('should hand decoded envelopes to the topic handlers', async () => {
      await eventBus.connect();
      const handler = jest.fn().mockResolvedValue(undefined);
      await eventBus.subscribe('banking.movement.events', handler);

      messageHandler()('banking.movement.events', JSON.stringify(envelope));
      await flushDispatch();

      expect(handler).toHaveBeenCalledWith(envelope);
    });

    it('should log JSON parse errors', async () => {
      await eventBus.connect();

      messageHandler()('banking.customer.events', 'invalid-json');
      await flushDispatch();

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error), channel: 'banking.customer.events' }),
        'Error parsing event message'
      );
    });

    it('should keep running later handlers when one fails', async () => {
      await eventBus.connect();
      const failing = jest.fn().mockRejectedValue(new Error('Handler error'));
      const next = jest.fn().mockResolvedValue(undefined);
      await eventBus.subscribe('banking.movement.events', failing);
      await eventBus.subscribe('banking.movement.events', next);

      messageHandler()('banking.movement.events', JSON.stringify(envelope));
      await flushDispatch();

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error), eventType: EventType.MOVEMENT_CREATED }),
        'Error handling event'
      );
      expect(next).toHaveBeenCalledTimes(1);
    });
  });

  describe('decodeEnvelope', () => {
    it('should synthesise an envelope for a bare body', () => {
      const decoded = decodeEnvelope(
        'banking.customer.events',
        JSON.stringify({ eventType: 'customer.created', eventId: 'evt-1', customerId: 'cust-1' })
      );

      expect(decoded.topic).toBe('banking.customer.events');
      expect(decoded.key).toBe('');
      expect(decoded.headers).toEqual({ eventType: 'customer.created' });
      expect(decoded.body).toEqual({ eventType: 'customer.created', eventId: 'evt-1', customerId: 'cust-1' });
    });

    it('should keep numeric keys as strings', () => {
      const decoded = decodeEnvelope('t', JSON.stringify({ key: 12, headers: { eventType: 'x' }, body: {} }));

      expect(decoded.key).toBe('12');
      expect(decoded.headers.correlationId).toBeUndefined();
    });

    it('should leave the timestamp out when the producer sent none', () => {
      const stamped = decodeEnvelope(
        't',
        JSON.stringify({ headers: { eventType: 'x', timestamp: '2024-03-01T10:00:00.000Z' }, body: {} })
      );
      const unstamped = decodeEnvelope('t', JSON.stringify({ headers: { eventType: 'x' }, body: {} }));

      expect(stamped.headers.timestamp).toBe('2024-03-01T10:00:00.000Z');
      expect(unstamped.headers).toEqual({ eventType: 'x' });
    });
  });
});
