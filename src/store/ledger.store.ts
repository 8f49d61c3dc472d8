/**
 * Ledger Store contract
 *
 * Durable storage for accounts and movements. Implementations must provide:
 * - account numbers that are allocated once and never reused
 * - uniqueness of movementId, transactionId and (when present) idempotencyKey
 * - commitMovement as one all-or-nothing unit guarded by the account version
 * - deleteAccountCascade removing movements and the account together, optionally version guarded
 */

import { Account, AccountCategory, AccountOwner, Movement, MovementKind } from '../types/ledger';

export interface OpenAccountInput {
  owner: AccountOwner;
  category: AccountCategory;
  now: Date;
}

export interface MovementQuery {
  /** Inclusive lower bound on createdAt */
  from?: Date;
  /** Inclusive upper bound on createdAt */
  to?: Date;
  order: 'asc' | 'desc';
  limit?: number;
}

export interface AccountFilter {
  customerId?: string;
  category?: AccountCategory;
  active?: boolean;
}

export interface AccountChanges {
  active?: boolean;
  category?: AccountCategory;
}

/**
 * Movement search across accounts. Results come newest first.
 */
export interface MovementSearch {
  /** Restrict to these accounts; an empty list matches nothing */
  accountNumbers?: number[];
  kind?: MovementKind;
  from?: Date;
  to?: Date;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface MovementPage {
  items: Movement[];
  total: number;
}

/**
 * One atomic ledger write: the account moves from expectedVersion to
 * expectedVersion + 1 with balanceAfter, and movement is appended. When the
 * movement carries reversedMovementId the referenced movement is flagged
 * reversed in the same unit.
 */
export interface MovementCommit {
  accountNumber: number;
  expectedVersion: number;
  balanceAfter: number;
  movement: Movement;
}

export interface CascadeResult {
  deleted: boolean;
  movementsDeleted: number;
}

export type UniqueMovementField = 'movementId' | 'transactionId' | 'idempotencyKey';

/**
 * The account (or the movement being reversed) changed since it was read.
 */
export class VersionConflictError extends Error {
  constructor(
    public readonly accountNumber: number,
    public readonly expectedVersion: number
  ) {
    super(`Version conflict on account ${accountNumber} (expected version ${expectedVersion})`);
    this.name = 'VersionConflictError';
  }
}

/**
 * A unique constraint on a movement field rejected the insert.
 */
export class DuplicateKeyError extends Error {
  constructor(
    public readonly field: UniqueMovementField,
    public readonly value: string
  ) {
    super(`Duplicate movement ${field}: ${value}`);
    this.name = 'DuplicateKeyError';
  }
}

export interface LedgerStore {
  readonly driver: string;

  openAccount(input: OpenAccountInput): Promise<Account>;
  findAccount(accountNumber: number): Promise<Account | null>;
  findAccountsByCustomer(customerId: string): Promise<Account[]>;
  /** Accounts matching every given field, by account number */
  findAccounts(filter: AccountFilter): Promise<Account[]>;
  countActiveAccounts(customerId: string): Promise<number>;
  hasActiveAccountOfCategory(customerId: string, category: AccountCategory): Promise<boolean>;

  /**
   * Apply changes to an account, guarded by the account version.
   * @throws VersionConflictError
   */
  updateAccount(accountNumber: number, expectedVersion: number, changes: AccountChanges, now: Date): Promise<Account>;

  /**
   * Remove the account and every movement of it, atomically. With
   * expectedVersion, nothing is removed unless the account is still at it.
   * @throws VersionConflictError
   */
  deleteAccountCascade(accountNumber: number, expectedVersion?: number): Promise<CascadeResult>;

  findMovement(movementId: string): Promise<Movement | null>;
  findMovementByTransactionId(transactionId: string): Promise<Movement | null>;
  findMovementByIdempotencyKey(idempotencyKey: string): Promise<Movement | null>;
  findMovements(accountNumber: number, query: MovementQuery): Promise<Movement[]>;
  /** Without a page every match is returned */
  searchMovements(search: MovementSearch, page?: PageRequest): Promise<MovementPage>;

  /**
   * @throws VersionConflictError when the account version moved or the reversed movement is already flagged
   * @throws DuplicateKeyError when a unique movement field already exists
   */
  commitMovement(commit: MovementCommit): Promise<Account>;
}
