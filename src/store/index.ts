import { LedgerStoreDriver } from '../config';

import { LedgerStore } from './ledger.store';
import { InMemoryLedgerStore } from './memory.store';
import { MongoLedgerStore } from './mongo.store';

export * from './ledger.store';
export { InMemoryLedgerStore } from './memory.store';
export { MongoLedgerStore, translateDuplicateKey } from './mongo.store';

export const createLedgerStore = (driver: LedgerStoreDriver): LedgerStore =>
  driver === 'memory' ? new InMemoryLedgerStore() : new MongoLedgerStore();
