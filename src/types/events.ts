/**
 * Event bus contracts
 *
 * Every message on the bus is an envelope: the topic it was published on, the
 * partition key (entity id), headers and a JSON body. Produced bodies carry
 * money as decimal strings.
 */

export enum EventType {
  // Produced
  ACCOUNT_CREATED = 'account.created',
  ACCOUNT_UPDATED = 'account.updated',
  ACCOUNT_DELETED = 'account.deleted',
  MOVEMENT_CREATED = 'movement.created',

  // Consumed
  CUSTOMER_CREATED = 'customer.created',
  CUSTOMER_UPDATED = 'customer.updated',
  CUSTOMER_DELETED = 'customer.deleted',
}

export interface EventHeaders {
  /** ISO-8601 creation time; absent when a producer sent none */
  timestamp?: string;
  eventType: string;
  correlationId?: string;
}

export interface EventEnvelope<TBody = unknown> {
  topic: string;
  key: string;
  headers: EventHeaders;
  body: TBody;
}

export type EventHandler = (envelope: EventEnvelope) => Promise<void>;

export interface AccountCreatedBody {
  accountNumber: number;
  customerId: string;
  customerName: string;
  category: string;
  balance: string;
  createdAt: string;
}

export interface AccountUpdatedBody {
  accountNumber: number;
  customerId: string;
  category: string;
  balance: string;
  active: boolean;
  version: number;
  updatedAt: string;
}

export interface AccountDeletedBody {
  accountNumber: number;
  customerId: string;
  hard: boolean;
  reason: 'request' | 'customer_deleted';
  deletedAt: string;
}

export interface MovementCreatedBody {
  movementId: string;
  accountNumber: number;
  kind: string;
  amount: string;
  balanceBefore: string;
  balanceAfter: string;
  transactionId: string;
  reversedMovementId?: string;
  description?: string;
  reference?: string;
  createdAt: string;
}

export type CustomerEventType =
  | EventType.CUSTOMER_CREATED
  | EventType.CUSTOMER_UPDATED
  | EventType.CUSTOMER_DELETED;

/**
 * Customer lifecycle event as consumed from banking.customer.events
 */
export interface CustomerEvent {
  eventId: string;
  eventType: CustomerEventType;
  customerId: string;
  name?: string;
  active: boolean;
  occurredAt: Date;
}

const CUSTOMER_EVENT_TYPES: readonly string[] = [
  EventType.CUSTOMER_CREATED,
  EventType.CUSTOMER_UPDATED,
  EventType.CUSTOMER_DELETED,
];

const isCustomerEventType = (value: unknown): value is CustomerEventType =>
  typeof value === 'string' && CUSTOMER_EVENT_TYPES.includes(value);

const readField = (source: object, field: string): unknown =>
  field in source ? Reflect.get(source, field) : undefined;

const readString = (source: object, field: string): string | undefined => {
  const value = readField(source, field);
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

// ISO strings or epoch milliseconds
const readTime = (source: object, field: string): Date | undefined => {
  const value = readField(source, field);
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const time = new Date(value);
  return Number.isNaN(time.getTime()) ? undefined : time;
};

/**
 * Narrow an envelope from the customer topic into a CustomerEvent.
 *
 * The event type comes from the body, falling back to the eventType header;
 * the timestamp from the body's occurredAt/timestamp, falling back to the
 * header. An event carrying no producer timestamp cannot be ordered against
 * lookups and is dropped. A deleted event is inactive whatever its body says.
 * Returns null for anything that cannot be applied.
 */
export const parseCustomerEvent = (envelope: EventEnvelope): CustomerEvent | null => {
  const body = envelope.body;
  if (typeof body !== 'object' || body === null) {
    return null;
  }

  const eventType = readString(body, 'eventType') ?? envelope.headers.eventType;
  if (!isCustomerEventType(eventType)) {
    return null;
  }

  const customerId = readString(body, 'customerId') ?? envelope.key;
  const eventId = readString(body, 'eventId');
  const occurredAt =
    readTime(body, 'occurredAt') ?? readTime(body, 'timestamp') ?? readTime(envelope.headers, 'timestamp');
  if (!customerId || !eventId || !occurredAt) {
    return null;
  }

  // Customer service bodies call the flag `state`
  const activeFlag = readField(body, 'active') ?? readField(body, 'state');
  const active = eventType === EventType.CUSTOMER_DELETED ? false : activeFlag !== false;

  return {
    eventId,
    eventType,
    customerId,
    name: readString(body, 'name'),
    active,
    occurredAt,
  };
};
