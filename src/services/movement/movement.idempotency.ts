/**
 * Idempotency Guard
 *
 * A movement is created at most once per transactionId and, when supplied,
 * per idempotencyKey. The pre-check here avoids a failed insert on ordinary
 * client retries; the store's unique constraints remain the final word, and a
 * constraint hit is resolved the same way as a pre-check hit.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { DuplicateKeyError, LedgerStore } from '../../store/ledger.store';
import { Movement, MovementKind } from '../../types/ledger';

export interface IdempotencyKeys {
  transactionId: string;
  idempotencyKey?: string;
}

/**
 * The fields that define what a request asks for. A stored movement only
 * counts as a replay of the request when all of them agree.
 */
export interface MovementFingerprint {
  accountNumber: number;
  kind: MovementKind;
  amount: number;
  reversedMovementId?: string;
}

export type IdempotencyDecision = { replay: true; movement: Movement } | { replay: false };

export type FingerprintField = keyof MovementFingerprint;

/**
 * First defining field on which the stored movement and the request disagree
 */
export function findFingerprintMismatch(stored: Movement, request: MovementFingerprint): FingerprintField | null {
  if (stored.accountNumber !== request.accountNumber) {
    return 'accountNumber';
  }
  if (stored.amount !== request.amount) {
    return 'amount';
  }
  if (stored.kind !== request.kind) {
    return 'kind';
  }
  if (request.reversedMovementId !== undefined && stored.reversedMovementId !== request.reversedMovementId) {
    return 'reversedMovementId';
  }
  return null;
}

export class IdempotencyGuard {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Decide whether the request must be applied or answered with a stored movement.
   * @throws ApiError IDEMPOTENCY_CONFLICT
   */
  async check(keys: IdempotencyKeys, request: MovementFingerprint): Promise<IdempotencyDecision> {
    const [byTransaction, byKey] = await Promise.all([
      this.store.findMovementByTransactionId(keys.transactionId),
      keys.idempotencyKey ? this.store.findMovementByIdempotencyKey(keys.idempotencyKey) : Promise.resolve(null),
    ]);

    if (byTransaction && byKey && byTransaction.movementId !== byKey.movementId) {
      throw ApiError.idempotencyConflict(
        `Transaction ${keys.transactionId} and idempotency key ${keys.idempotencyKey} belong to different movements`
      );
    }

    const existing = byTransaction ?? byKey;
    if (!existing) {
      return { replay: false };
    }

    const mismatch = findFingerprintMismatch(existing, request);
    if (mismatch) {
      const label = byTransaction ? `Transaction ${keys.transactionId}` : `Idempotency key ${keys.idempotencyKey}`;
      throw ApiError.idempotencyConflict(`${label} was already used with a different ${mismatch}`);
    }

    return { replay: true, movement: existing };
  }

  /**
   * Turn a unique-constraint hit on insert into the stored movement, or a conflict.
   */
  async resolveDuplicate(
    error: DuplicateKeyError,
    keys: IdempotencyKeys,
    request: MovementFingerprint
  ): Promise<Movement> {
    const decision = await this.check(keys, request);
    if (decision.replay) {
      return decision.movement;
    }
    // The colliding record disappeared between insert and re-read (cascade delete)
    throw ApiError.idempotencyConflict(`Duplicate ${error.field} ${error.value} could not be resolved`);
  }
}
