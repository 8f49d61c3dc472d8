import { v4 as uuid } from 'uuid';

import { EventPublisher } from '../../events/eventPublisher';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { getCorrelationId, getRequestId } from '../../observability/log-context';
import {
  activeMovements,
  movementAmount,
  movementRetriesTotal,
  movementsTotal,
} from '../../observability/metrics';
import { traceLedgerOperation } from '../../observability/tracing';
import { DuplicateKeyError, LedgerStore, VersionConflictError } from '../../store/ledger.store';
import { EventType, MovementCreatedBody } from '../../types/events';
import { Account, Movement, MovementKind, signedEffect } from '../../types/ledger';
import { formatMinorUnits } from '../../utils/money';
import { toDayRange } from '../../utils/period';
import { CustomerProjectionCache } from '../customer/customer.cache';

import { IdempotencyGuard, IdempotencyKeys, MovementFingerprint } from './movement.idempotency';

const log = createServiceLogger('movement-engine');

export interface ApplyMovementCommand {
  accountNumber: number;
  kind: MovementKind;
  /** Minor units */
  amount: number;
  transactionId: string;
  idempotencyKey?: string;
  description?: string;
  reference?: string;
}

export interface ReverseMovementCommand {
  movementId: string;
  transactionId: string;
  idempotencyKey?: string;
  description?: string;
}

export interface MovementEngineOptions {
  /** Retries after the first attempt on a version conflict */
  maxRetries: number;
  retryBackoffMs: number;
  topic: string;
}

export const DEFAULT_MOVEMENT_LIMIT = 50;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * Filters combine; dates are whole UTC days. Pages are numbered from 0.
 */
export interface MovementSearchCriteria {
  accountNumber?: number;
  customerId?: string;
  kind?: MovementKind;
  startDate?: string;
  endDate?: string;
  page: number;
  size: number;
}

export interface PagedMovements {
  content: Movement[];
  page: {
    size: number;
    number: number;
    totalElements: number;
    totalPages: number;
  };
}

/**
 * What one attempt intends to write, computed from a fresh read of the account
 */
interface MovementPlan {
  movement: Movement;
  balanceAfter: number;
}

type PlanBuilder = (account: Account) => Promise<MovementPlan>;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const toMovementCreatedBody = (movement: Movement): MovementCreatedBody => ({
  movementId: movement.movementId,
  accountNumber: movement.accountNumber,
  kind: movement.kind,
  amount: formatMinorUnits(movement.amount),
  balanceBefore: formatMinorUnits(movement.balanceBefore),
  balanceAfter: formatMinorUnits(movement.balanceAfter),
  transactionId: movement.transactionId,
  reversedMovementId: movement.reversedMovementId,
  description: movement.description,
  reference: movement.reference,
  createdAt: movement.createdAt.toISOString(),
});

/**
 * Movement Engine
 *
 * Applies credits, debits and reversals. Each accepted movement updates the
 * balance and appends the movement in one version-guarded store commit;
 * conflicting writers retry from a fresh read up to maxRetries times.
 */
export class MovementService {
  private readonly guard: IdempotencyGuard;

  constructor(
    private readonly store: LedgerStore,
    private readonly customers: CustomerProjectionCache,
    private readonly publisher: EventPublisher,
    private readonly options: MovementEngineOptions,
    private readonly now: () => Date = () => new Date(),
    private readonly newId: () => string = uuid
  ) {
    this.guard = new IdempotencyGuard(store);
  }

  /**
   * Apply a CREDIT or DEBIT. A request whose transactionId (or idempotency key)
   * was already applied returns the stored movement unchanged.
   */
  async applyMovement(command: ApplyMovementCommand): Promise<Movement> {
    return this.instrument('apply_movement', command.kind, { 'ledger.account_number': command.accountNumber }, async () => {
      this.validateCommand(command);

      const keys: IdempotencyKeys = { transactionId: command.transactionId, idempotencyKey: command.idempotencyKey };
      const fingerprint: MovementFingerprint = {
        accountNumber: command.accountNumber,
        kind: command.kind,
        amount: command.amount,
      };

      const decision = await this.guard.check(keys, fingerprint);
      if (decision.replay) {
        return this.replayed(decision.movement);
      }

      return this.commitWithRetry(command.accountNumber, keys, fingerprint, async (account) => {
        if (command.kind === MovementKind.DEBIT && command.amount > account.balance) {
          throw ApiError.insufficientFunds(formatMinorUnits(account.balance), formatMinorUnits(command.amount));
        }
        const balanceAfter =
          command.kind === MovementKind.CREDIT ? account.balance + command.amount : account.balance - command.amount;

        return {
          balanceAfter,
          movement: this.buildMovement(account, {
            kind: command.kind,
            amount: command.amount,
            balanceAfter,
            keys,
            description: command.description,
            reference: command.reference,
          }),
        };
      });
    });
  }

  /**
   * Apply a REVERSAL of an earlier CREDIT or DEBIT: same amount, opposite sign.
   * The original is flagged reversed in the same commit.
   */
  async reverseMovement(command: ReverseMovementCommand): Promise<Movement> {
    return this.instrument('reverse_movement', MovementKind.REVERSAL, { 'ledger.movement_id': command.movementId }, async () => {
      if (!command.transactionId || command.transactionId.trim() === '') {
        throw ApiError.validationError('transactionId is required');
      }

      const original = await this.store.findMovement(command.movementId);
      if (!original) {
        throw ApiError.notFound('movement', command.movementId);
      }
      if (original.kind === MovementKind.REVERSAL) {
        throw ApiError.validationError(`Movement ${original.movementId} is a reversal and cannot be reversed`);
      }

      const keys: IdempotencyKeys = { transactionId: command.transactionId, idempotencyKey: command.idempotencyKey };
      const fingerprint: MovementFingerprint = {
        accountNumber: original.accountNumber,
        kind: MovementKind.REVERSAL,
        amount: original.amount,
        reversedMovementId: original.movementId,
      };

      const decision = await this.guard.check(keys, fingerprint);
      if (decision.replay) {
        return this.replayed(decision.movement);
      }
      if (original.reversed) {
        throw ApiError.alreadyReversed(original.movementId);
      }

      return this.commitWithRetry(original.accountNumber, keys, fingerprint, async (account) => {
        // Re-read on every attempt: a competing reversal may have landed
        const current = await this.store.findMovement(original.movementId);
        if (!current) {
          throw ApiError.notFound('movement', original.movementId);
        }
        if (current.reversed) {
          throw ApiError.alreadyReversed(current.movementId);
        }

        const balanceAfter = account.balance - signedEffect(current);
        if (balanceAfter < 0) {
          throw ApiError.insufficientFunds(formatMinorUnits(account.balance), formatMinorUnits(current.amount));
        }

        return {
          balanceAfter,
          movement: this.buildMovement(account, {
            kind: MovementKind.REVERSAL,
            amount: current.amount,
            balanceAfter,
            keys,
            description: command.description ?? `Reversal of movement ${current.movementId}`,
            reference: current.reference,
            reversedMovementId: current.movementId,
          }),
        };
      });
    });
  }

  async getMovement(movementId: string): Promise<Movement> {
    const movement = await this.store.findMovement(movementId);
    if (!movement) {
      throw ApiError.notFound('movement', movementId);
    }
    return movement;
  }

  /**
   * Most recent movements of an account, newest first
   */
  async listMovements(accountNumber: number, limit: number = DEFAULT_MOVEMENT_LIMIT): Promise<Movement[]> {
    const account = await this.store.findAccount(accountNumber);
    if (!account) {
      throw ApiError.notFound('account', accountNumber);
    }
    return this.store.findMovements(accountNumber, { order: 'desc', limit });
  }

  /**
   * Paged search across accounts, newest first
   */
  async searchMovements(criteria: MovementSearchCriteria): Promise<PagedMovements> {
    const { page, size } = criteria;
    if (!Number.isInteger(page) || page < 0 || !Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
      throw ApiError.validationError(`page must be 0 or more and size between 1 and ${MAX_PAGE_SIZE}`);
    }
    const range = toDayRange(criteria.startDate, criteria.endDate);

    let accountNumbers: number[] | undefined;
    if (criteria.customerId !== undefined) {
      const owned = await this.store.findAccountsByCustomer(criteria.customerId);
      accountNumbers = owned.map((account) => account.accountNumber);
    }
    if (criteria.accountNumber !== undefined) {
      const wanted = criteria.accountNumber;
      accountNumbers = accountNumbers ? accountNumbers.filter((number) => number === wanted) : [wanted];
    }

    const result = await this.store.searchMovements(
      { accountNumbers, kind: criteria.kind, from: range.from, to: range.to },
      { offset: page * size, limit: size }
    );
    return {
      content: result.items,
      page: { size, number: page, totalElements: result.total, totalPages: Math.ceil(result.total / size) },
    };
  }

  private validateCommand(command: ApplyMovementCommand): void {
    if (command.kind !== MovementKind.CREDIT && command.kind !== MovementKind.DEBIT) {
      throw ApiError.validationError(`Movement kind must be CREDIT or DEBIT, got ${command.kind}`);
    }
    if (!Number.isSafeInteger(command.amount) || command.amount <= 0) {
      throw ApiError.invalidAmount();
    }
    if (!command.transactionId || command.transactionId.trim() === '') {
      throw ApiError.validationError('transactionId is required');
    }
  }

  private async loadMutableAccount(accountNumber: number): Promise<Account> {
    const account = await this.store.findAccount(accountNumber);
    if (!account) {
      throw ApiError.notFound('account', accountNumber);
    }
    if (!account.active) {
      throw ApiError.accountNotActive(accountNumber);
    }
    return account;
  }

  /**
   * Read, plan, commit; on a version conflict start over from the read.
   */
  private async commitWithRetry(
    accountNumber: number,
    keys: IdempotencyKeys,
    fingerprint: MovementFingerprint,
    plan: PlanBuilder
  ): Promise<Movement> {
    let account = await this.loadMutableAccount(accountNumber);
    await this.customers.ensureCustomerActive(account.owner.customerId);

    for (let attempt = 1; ; attempt++) {
      const { movement, balanceAfter } = await plan(account);

      try {
        await this.store.commitMovement({
          accountNumber,
          expectedVersion: account.version,
          balanceAfter,
          movement,
        });
      } catch (error) {
        if (error instanceof DuplicateKeyError && error.field !== 'movementId') {
          log.info({ accountNumber, field: error.field, value: error.value }, 'Insert hit a unique key; resolving');
          return this.replayed(await this.guard.resolveDuplicate(error, keys, fingerprint));
        }
        if (!(error instanceof VersionConflictError) && !(error instanceof DuplicateKeyError)) {
          throw error;
        }
        if (attempt > this.options.maxRetries) {
          log.warn({ accountNumber, attempts: attempt }, 'Giving up after repeated version conflicts');
          throw ApiError.concurrentModification(accountNumber, attempt);
        }

        movementRetriesTotal.inc();
        log.debug({ accountNumber, attempt }, 'Version conflict; retrying');
        if (this.options.retryBackoffMs > 0) {
          await sleep(this.options.retryBackoffMs * attempt);
        }
        // The competing commit may carry the same keys
        const decision = await this.guard.check(keys, fingerprint);
        if (decision.replay) {
          return this.replayed(decision.movement);
        }
        account = await this.loadMutableAccount(accountNumber);
        continue;
      }

      this.applied(movement);
      return movement;
    }
  }

  private buildMovement(
    account: Account,
    draft: {
      kind: MovementKind;
      amount: number;
      balanceAfter: number;
      keys: IdempotencyKeys;
      description?: string;
      reference?: string;
      reversedMovementId?: string;
    }
  ): Movement {
    return {
      movementId: this.newId(),
      accountNumber: account.accountNumber,
      kind: draft.kind,
      amount: draft.amount,
      balanceBefore: account.balance,
      balanceAfter: draft.balanceAfter,
      description: draft.description,
      reference: draft.reference,
      transactionId: draft.keys.transactionId,
      idempotencyKey: draft.keys.idempotencyKey,
      reversedMovementId: draft.reversedMovementId,
      reversed: false,
      correlationId: getCorrelationId(),
      requestId: getRequestId(),
      createdAt: this.now(),
    };
  }

  private applied(movement: Movement): void {
    movementsTotal.inc({ kind: movement.kind, outcome: 'applied' });
    movementAmount.observe({ kind: movement.kind }, movement.amount / 100);
    log.info(
      {
        movementId: movement.movementId,
        accountNumber: movement.accountNumber,
        kind: movement.kind,
        transactionId: movement.transactionId,
        balanceAfter: movement.balanceAfter,
      },
      'Movement applied'
    );

    this.publisher.emit(
      this.options.topic,
      movement.accountNumber,
      EventType.MOVEMENT_CREATED,
      toMovementCreatedBody(movement)
    );
  }

  private replayed(movement: Movement): Movement {
    movementsTotal.inc({ kind: movement.kind, outcome: 'replayed' });
    log.info(
      { movementId: movement.movementId, transactionId: movement.transactionId },
      'Idempotent replay; returning stored movement'
    );
    return movement;
  }

  private async instrument<T>(
    operation: string,
    kind: MovementKind,
    attributes: Record<string, string | number>,
    fn: () => Promise<T>
  ): Promise<T> {
    activeMovements.inc();
    try {
      return await traceLedgerOperation(operation, { ...attributes, 'ledger.kind': kind }, () => fn());
    } catch (error) {
      const outcome = error instanceof ApiError ? 'rejected' : 'failed';
      movementsTotal.inc({ kind, outcome });
      throw error;
    } finally {
      activeMovements.dec();
    }
  }
}
