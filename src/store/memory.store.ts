// =============================================================================
// MEMORY STORE: LedgerStore backed by in-memory Maps
// =============================================================================
// Used by the test suite and by LEDGER_STORE=memory local runs. Every check and
// write of one atomic unit happens synchronously inside a single call, so no
// other task can interleave between the version check and the mutation.
// Records are copied on the way in and out; callers never hold live references.

import { Account, AccountCategory, Movement } from '../types/ledger';
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
  VersionConflictError,
} from './ledger.store';

const copyAccount = (account: Account): Account => ({
  ...account,
  owner: { ...account.owner },
  createdAt: new Date(account.createdAt.getTime()),
  updatedAt: new Date(account.updatedAt.getTime()),
});

const copyMovement = (movement: Movement): Movement => ({
  ...movement,
  createdAt: new Date(movement.createdAt.getTime()),
});

export class InMemoryLedgerStore implements LedgerStore {
  readonly driver = 'memory';

  private accounts = new Map<number, Account>();
  private movements = new Map<string, Movement>();
  private byTransactionId = new Map<string, string>();
  private byIdempotencyKey = new Map<string, string>();
  private nextAccountNumber = 1;

  async openAccount(input: OpenAccountInput): Promise<Account> {
    const account: Account = {
      accountNumber: this.nextAccountNumber++,
      owner: { ...input.owner },
      category: input.category,
      balance: 0,
      active: true,
      version: 0,
      createdAt: input.now,
      updatedAt: input.now,
    };
    this.accounts.set(account.accountNumber, account);
    return copyAccount(account);
  }

  async findAccount(accountNumber: number): Promise<Account | null> {
    const account = this.accounts.get(accountNumber);
    return account ? copyAccount(account) : null;
  }

  async findAccountsByCustomer(customerId: string): Promise<Account[]> {
    return [...this.accounts.values()]
      .filter((account) => account.owner.customerId === customerId)
      .sort((a, b) => a.accountNumber - b.accountNumber)
      .map(copyAccount);
  }

  async findAccounts(filter: AccountFilter): Promise<Account[]> {
    return [...this.accounts.values()]
      .filter(
        (account) =>
          (filter.customerId === undefined || account.owner.customerId === filter.customerId) &&
          (filter.category === undefined || account.category === filter.category) &&
          (filter.active === undefined || account.active === filter.active)
      )
      .sort((a, b) => a.accountNumber - b.accountNumber)
      .map(copyAccount);
  }

  async countActiveAccounts(customerId: string): Promise<number> {
    let count = 0;
    for (const account of this.accounts.values()) {
      if (account.owner.customerId === customerId && account.active) {
        count++;
      }
    }
    return count;
  }

  async hasActiveAccountOfCategory(customerId: string, category: AccountCategory): Promise<boolean> {
    for (const account of this.accounts.values()) {
      if (account.owner.customerId === customerId && account.active && account.category === category) {
        return true;
      }
    }
    return false;
  }

  async updateAccount(
    accountNumber: number,
    expectedVersion: number,
    changes: AccountChanges,
    now: Date
  ): Promise<Account> {
    const account = this.accounts.get(accountNumber);
    if (!account || account.version !== expectedVersion) {
      throw new VersionConflictError(accountNumber, expectedVersion);
    }
    if (changes.active !== undefined) account.active = changes.active;
    if (changes.category !== undefined) account.category = changes.category;
    account.version += 1;
    account.updatedAt = now;
    return copyAccount(account);
  }

  async deleteAccountCascade(accountNumber: number, expectedVersion?: number): Promise<CascadeResult> {
    const account = this.accounts.get(accountNumber);
    if (!account) {
      return { deleted: false, movementsDeleted: 0 };
    }
    if (expectedVersion !== undefined && account.version !== expectedVersion) {
      throw new VersionConflictError(accountNumber, expectedVersion);
    }

    let movementsDeleted = 0;
    for (const [movementId, movement] of this.movements) {
      if (movement.accountNumber === accountNumber) {
        this.movements.delete(movementId);
        this.byTransactionId.delete(movement.transactionId);
        if (movement.idempotencyKey) {
          this.byIdempotencyKey.delete(movement.idempotencyKey);
        }
        movementsDeleted++;
      }
    }
    this.accounts.delete(accountNumber);
    return { deleted: true, movementsDeleted };
  }

  async findMovement(movementId: string): Promise<Movement | null> {
    const movement = this.movements.get(movementId);
    return movement ? copyMovement(movement) : null;
  }

  async findMovementByTransactionId(transactionId: string): Promise<Movement | null> {
    const movementId = this.byTransactionId.get(transactionId);
    return movementId ? this.findMovement(movementId) : null;
  }

  async findMovementByIdempotencyKey(idempotencyKey: string): Promise<Movement | null> {
    const movementId = this.byIdempotencyKey.get(idempotencyKey);
    return movementId ? this.findMovement(movementId) : null;
  }

  async findMovements(accountNumber: number, query: MovementQuery): Promise<Movement[]> {
    const from = query.from?.getTime() ?? Number.NEGATIVE_INFINITY;
    const to = query.to?.getTime() ?? Number.POSITIVE_INFINITY;
    // Map iteration follows insertion order and sort is stable, so same-millisecond
    // movements keep the order they were committed in
    const matches = [...this.movements.values()]
      .filter((movement) => {
        const at = movement.createdAt.getTime();
        return movement.accountNumber === accountNumber && at >= from && at <= to;
      })
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    if (query.order === 'desc') {
      matches.reverse();
    }

    const limited = query.limit !== undefined ? matches.slice(0, query.limit) : matches;
    return limited.map(copyMovement);
  }

  async searchMovements(search: MovementSearch, page?: PageRequest): Promise<MovementPage> {
    const from = search.from?.getTime() ?? Number.NEGATIVE_INFINITY;
    const to = search.to?.getTime() ?? Number.POSITIVE_INFINITY;
    const matches = [...this.movements.values()]
      .filter((movement) => {
        const at = movement.createdAt.getTime();
        return (
          (search.accountNumbers === undefined || search.accountNumbers.includes(movement.accountNumber)) &&
          (search.kind === undefined || movement.kind === search.kind) &&
          at >= from &&
          at <= to
        );
      })
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .reverse();

    const items = page ? matches.slice(page.offset, page.offset + page.limit) : matches;
    return { items: items.map(copyMovement), total: matches.length };
  }

  async commitMovement(commit: MovementCommit): Promise<Account> {
    const { movement } = commit;
    const account = this.accounts.get(commit.accountNumber);
    if (!account || account.version !== commit.expectedVersion) {
      throw new VersionConflictError(commit.accountNumber, commit.expectedVersion);
    }

    if (this.movements.has(movement.movementId)) {
      throw new DuplicateKeyError('movementId', movement.movementId);
    }
    if (this.byTransactionId.has(movement.transactionId)) {
      throw new DuplicateKeyError('transactionId', movement.transactionId);
    }
    if (movement.idempotencyKey && this.byIdempotencyKey.has(movement.idempotencyKey)) {
      throw new DuplicateKeyError('idempotencyKey', movement.idempotencyKey);
    }

    let original: Movement | undefined;
    if (movement.reversedMovementId) {
      original = this.movements.get(movement.reversedMovementId);
      if (!original || original.reversed) {
        throw new VersionConflictError(commit.accountNumber, commit.expectedVersion);
      }
    }

    // All checks passed: apply the unit
    if (original) {
      original.reversed = true;
    }
    this.movements.set(movement.movementId, copyMovement(movement));
    this.byTransactionId.set(movement.transactionId, movement.movementId);
    if (movement.idempotencyKey) {
      this.byIdempotencyKey.set(movement.idempotencyKey, movement.movementId);
    }
    account.balance = commit.balanceAfter;
    account.version += 1;
    account.updatedAt = movement.createdAt;

    return copyAccount(account);
  }

  /**
   * Drop every record (tests)
   */
  clear(): void {
    this.accounts.clear();
    this.movements.clear();
    this.byTransactionId.clear();
    this.byIdempotencyKey.clear();
    this.nextAccountNumber = 1;
  }
}
