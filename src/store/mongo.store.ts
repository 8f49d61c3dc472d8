import mongoose, { ClientSession } from 'mongoose';

import { Account as AccountModel, IAccount } from '../models/Account';
import { Counter } from '../models/Counter';
import { Movement as MovementModel, IMovement } from '../models/Movement';
import { createServiceLogger } from '../observability/logger';
import { Account, AccountCategory, Movement, MovementKind } from '../types/ledger';
import {
  AccountChanges,
  AccountFilter,
  CascadeResult,
  DuplicateKeyError,
  LedgerStore,
  MovementCommit,
  MovementPage,
  MovementQuery,
  MovementSearch,
  OpenAccountInput,
  PageRequest,
  UniqueMovementField,
  VersionConflictError,
} from './ledger.store';

const log = createServiceLogger('mongo-store');

const ACCOUNT_SEQUENCE = 'accountNumber';
const UNIQUE_FIELDS: readonly UniqueMovementField[] = ['movementId', 'transactionId', 'idempotencyKey'];

const toAccount = (doc: IAccount): Account => ({
  accountNumber: doc.accountNumber,
  owner: { customerId: doc.owner.customerId, name: doc.owner.name },
  category: doc.category,
  balance: doc.balance,
  active: doc.active,
  version: doc.version,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toMovement = (doc: IMovement): Movement => ({
  movementId: doc.movementId,
  accountNumber: doc.accountNumber,
  kind: doc.kind,
  amount: doc.amount,
  balanceBefore: doc.balanceBefore,
  balanceAfter: doc.balanceAfter,
  description: doc.description ?? undefined,
  reference: doc.reference ?? undefined,
  transactionId: doc.transactionId,
  idempotencyKey: doc.idempotencyKey ?? undefined,
  reversedMovementId: doc.reversedMovementId ?? undefined,
  reversed: doc.reversed,
  correlationId: doc.correlationId ?? undefined,
  requestId: doc.requestId ?? undefined,
  createdAt: doc.createdAt,
});

/**
 * Map a driver E11000 error on the movements collection to the field it hit
 */
export const translateDuplicateKey = (error: unknown, movement: Movement): DuplicateKeyError | null => {
  if (typeof error !== 'object' || error === null || !('code' in error) || error.code !== 11000) {
    return null;
  }
  const keyPattern: unknown = 'keyPattern' in error ? error.keyPattern : undefined;
  const field =
    typeof keyPattern === 'object' && keyPattern !== null
      ? UNIQUE_FIELDS.find((candidate) => candidate in keyPattern)
      : undefined;
  if (!field) {
    return null;
  }
  return new DuplicateKeyError(field, movement[field] ?? '');
};

/**
 * LedgerStore over MongoDB. Each atomic unit runs in a session transaction,
 * so the deployment must be a replica set.
 */
export class MongoLedgerStore implements LedgerStore {
  readonly driver = 'mongo';

  private async inTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    const outcome: { value?: T } = {};
    try {
      await session.withTransaction(async () => {
        outcome.value = await work(session);
      });
    } finally {
      await session.endSession();
    }
    if (outcome.value === undefined) {
      throw new Error('Transaction completed without a result');
    }
    return outcome.value;
  }

  async openAccount(input: OpenAccountInput): Promise<Account> {
    const counter = await Counter.findOneAndUpdate(
      { key: ACCOUNT_SEQUENCE },
      { $inc: { seq: 1 } },
      { new: true, upsert: true }
    );
    if (!counter) {
      throw new Error('Account number sequence unavailable');
    }

    const doc = await AccountModel.create({
      accountNumber: counter.seq,
      owner: input.owner,
      category: input.category,
      balance: 0,
      active: true,
      version: 0,
      createdAt: input.now,
      updatedAt: input.now,
    });
    log.debug({ accountNumber: doc.accountNumber }, 'Account inserted');
    return toAccount(doc);
  }

  async findAccount(accountNumber: number): Promise<Account | null> {
    const doc = await AccountModel.findOne({ accountNumber });
    return doc ? toAccount(doc) : null;
  }

  async findAccountsByCustomer(customerId: string): Promise<Account[]> {
    const docs = await AccountModel.find({ 'owner.customerId': customerId }).sort({ accountNumber: 1 });
    return docs.map(toAccount);
  }

  async findAccounts(filter: AccountFilter): Promise<Account[]> {
    const query: Record<string, string | boolean> = {};
    if (filter.customerId !== undefined) query['owner.customerId'] = filter.customerId;
    if (filter.category !== undefined) query.category = filter.category;
    if (filter.active !== undefined) query.active = filter.active;

    const docs = await AccountModel.find(query).sort({ accountNumber: 1 });
    return docs.map(toAccount);
  }

  async countActiveAccounts(customerId: string): Promise<number> {
    return AccountModel.countDocuments({ 'owner.customerId': customerId, active: true });
  }

  async hasActiveAccountOfCategory(customerId: string, category: AccountCategory): Promise<boolean> {
    const existing = await AccountModel.exists({ 'owner.customerId': customerId, active: true, category });
    return existing !== null;
  }

  async updateAccount(
    accountNumber: number,
    expectedVersion: number,
    changes: AccountChanges,
    now: Date
  ): Promise<Account> {
    const doc = await AccountModel.findOneAndUpdate(
      { accountNumber, version: expectedVersion },
      { $set: { ...changes, updatedAt: now }, $inc: { version: 1 } },
      { new: true }
    );
    if (!doc) {
      throw new VersionConflictError(accountNumber, expectedVersion);
    }
    return toAccount(doc);
  }

  async deleteAccountCascade(accountNumber: number, expectedVersion?: number): Promise<CascadeResult> {
    return this.inTransaction(async (session) => {
      const guard = expectedVersion === undefined ? { accountNumber } : { accountNumber, version: expectedVersion };
      const account = await AccountModel.deleteOne(guard, { session });
      if (account.deletedCount === 0) {
        if (expectedVersion !== undefined && (await AccountModel.exists({ accountNumber }).session(session))) {
          throw new VersionConflictError(accountNumber, expectedVersion);
        }
        return { deleted: false, movementsDeleted: 0 };
      }
      const movements = await MovementModel.deleteMany({ accountNumber }, { session });
      return { deleted: true, movementsDeleted: movements.deletedCount };
    });
  }

  async findMovement(movementId: string): Promise<Movement | null> {
    const doc = await MovementModel.findOne({ movementId });
    return doc ? toMovement(doc) : null;
  }

  async findMovementByTransactionId(transactionId: string): Promise<Movement | null> {
    const doc = await MovementModel.findOne({ transactionId });
    return doc ? toMovement(doc) : null;
  }

  async findMovementByIdempotencyKey(idempotencyKey: string): Promise<Movement | null> {
    const doc = await MovementModel.findOne({ idempotencyKey });
    return doc ? toMovement(doc) : null;
  }

  async findMovements(accountNumber: number, query: MovementQuery): Promise<Movement[]> {
    const createdAt: { $gte?: Date; $lte?: Date } = {};
    if (query.from) createdAt.$gte = query.from;
    if (query.to) createdAt.$lte = query.to;

    const filter = query.from || query.to ? { accountNumber, createdAt } : { accountNumber };
    const direction = query.order === 'asc' ? 1 : -1;

    let cursor = MovementModel.find(filter).sort({ createdAt: direction, _id: direction });
    if (query.limit !== undefined) {
      cursor = cursor.limit(query.limit);
    }
    const docs = await cursor;
    return docs.map(toMovement);
  }

  async searchMovements(search: MovementSearch, page?: PageRequest): Promise<MovementPage> {
    const filter: {
      accountNumber?: { $in: number[] };
      kind?: MovementKind;
      createdAt?: { $gte?: Date; $lte?: Date };
    } = {};
    if (search.accountNumbers !== undefined) filter.accountNumber = { $in: search.accountNumbers };
    if (search.kind !== undefined) filter.kind = search.kind;
    if (search.from || search.to) {
      filter.createdAt = {};
      if (search.from) filter.createdAt.$gte = search.from;
      if (search.to) filter.createdAt.$lte = search.to;
    }

    let cursor = MovementModel.find(filter).sort({ createdAt: -1, _id: -1 });
    if (page) {
      cursor = cursor.skip(page.offset).limit(page.limit);
    }
    const [docs, total] = await Promise.all([cursor, MovementModel.countDocuments(filter)]);
    return { items: docs.map(toMovement), total };
  }

  async commitMovement(commit: MovementCommit): Promise<Account> {
    const { movement } = commit;

    try {
      return await this.inTransaction(async (session) => {
        const account = await AccountModel.findOneAndUpdate(
          { accountNumber: commit.accountNumber, version: commit.expectedVersion },
          { $set: { balance: commit.balanceAfter, updatedAt: movement.createdAt }, $inc: { version: 1 } },
          { new: true, session }
        );
        if (!account) {
          throw new VersionConflictError(commit.accountNumber, commit.expectedVersion);
        }

        if (movement.reversedMovementId) {
          const flagged = await MovementModel.updateOne(
            { movementId: movement.reversedMovementId, reversed: false },
            { $set: { reversed: true } },
            { session }
          );
          if (flagged.modifiedCount === 0) {
            throw new VersionConflictError(commit.accountNumber, commit.expectedVersion);
          }
        }

        await MovementModel.create([movement], { session });
        return toAccount(account);
      });
    } catch (error) {
      const duplicate = translateDuplicateKey(error, movement);
      if (duplicate) {
        throw duplicate;
      }
      throw error;
    }
  }
}
