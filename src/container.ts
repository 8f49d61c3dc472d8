/**
 * Composition root
 *
 * Builds the store, the customer projection, the publisher and the services
 * once, and binds the customer lifecycle hooks. The server builds it with
 * defaults; tests pass overrides (in-memory store, stub directory, fake sink).
 */

import { config } from './config';
import { getDatabaseStatus } from './config/database';
import { EventSink, eventBus } from './events/eventBus';
import { EventPublisher } from './events/eventPublisher';
import { AccountService } from './services/account/account.service';
import { CustomerProjectionCache } from './services/customer/customer.cache';
import { CustomerDirectory, HttpCustomerClient } from './services/customer/customer.client';
import { CircuitBreaker, ResilientCustomerDirectory } from './services/customer/customer.resilience';
import { MovementService } from './services/movement/movement.service';
import { StatementService } from './services/statement/statement.service';
import { createLedgerStore } from './store';
import { LedgerStore } from './store/ledger.store';

export interface HealthStatus {
  store: { driver: string; connected: boolean; readyState?: number };
  eventBus: { connected: boolean };
}

export interface LedgerContainerOverrides {
  store?: LedgerStore;
  customerDirectory?: CustomerDirectory;
  eventSink?: EventSink;
  eventBusStatus?: () => { connected: boolean };
  now?: () => Date;
  newId?: () => string;
  ledger?: Partial<typeof config.ledger>;
}

export interface LedgerContainer {
  store: LedgerStore;
  customers: CustomerProjectionCache;
  publisher: EventPublisher;
  movementService: MovementService;
  accountService: AccountService;
  statementService: StatementService;
  topics: typeof config.topics;
  health(): HealthStatus;
}

export const createLedgerContainer = (overrides: LedgerContainerOverrides = {}): LedgerContainer => {
  const ledger = { ...config.ledger, ...overrides.ledger };
  const now = overrides.now ?? (() => new Date());

  const store = overrides.store ?? createLedgerStore(ledger.store);
  const directory =
    overrides.customerDirectory ??
    new ResilientCustomerDirectory(
      new HttpCustomerClient(config.customerService),
      new CircuitBreaker(config.customerService.circuitBreaker),
      config.customerService.retry
    );
  const customers = new CustomerProjectionCache(directory, now);
  const publisher = new EventPublisher(overrides.eventSink ?? eventBus, now);

  const movementService = new MovementService(
    store,
    customers,
    publisher,
    {
      maxRetries: ledger.maxRetries,
      retryBackoffMs: ledger.retryBackoffMs,
      topic: config.topics.MOVEMENT_EVENTS,
    },
    now,
    overrides.newId
  );

  const accountService = new AccountService(
    store,
    customers,
    publisher,
    {
      maxActiveAccountsPerCustomer: ledger.maxActiveAccountsPerCustomer,
      openDefaultAccount: ledger.openDefaultAccount,
      maxRetries: ledger.maxRetries,
      topic: config.topics.ACCOUNT_EVENTS,
    },
    now
  );

  const statementService = new StatementService(store, now);

  customers.setLifecycleHooks({
    onCreated: async (event) => {
      await accountService.openDefaultAccount(event);
    },
    onDeleted: async (event) => {
      await accountService.deleteAccountsByCustomer(event.customerId);
    },
  });

  const eventBusStatus = overrides.eventBusStatus ?? (() => eventBus.getStatus());

  return {
    store,
    customers,
    publisher,
    movementService,
    accountService,
    statementService,
    topics: config.topics,
    health: () => {
      const bus = eventBusStatus();
      if (store.driver === 'memory') {
        return { store: { driver: store.driver, connected: true }, eventBus: bus };
      }
      const db = getDatabaseStatus();
      return {
        store: { driver: store.driver, connected: db.connected, readyState: db.readyState },
        eventBus: bus,
      };
    },
  };
};
