/**
 * Ledger domain types
 *
 * Every amount and balance is an integer number of minor units (cents).
 * Conversion to and from decimal strings happens at the REST and event boundaries.
 */

export enum AccountCategory {
  SAVINGS = 'SAVINGS',
  CHECKING = 'CHECKING',
}

export enum MovementKind {
  CREDIT = 'CREDIT',
  DEBIT = 'DEBIT',
  REVERSAL = 'REVERSAL',
}

/**
 * Denormalized, read-only snapshot of the customer that owns an account.
 * The name may go stale after a rename in the customer service.
 */
export interface AccountOwner {
  customerId: string;
  name: string;
}

export interface Account {
  accountNumber: number;
  owner: AccountOwner;
  category: AccountCategory;
  balance: number;
  active: boolean;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Movement {
  movementId: string;
  accountNumber: number;
  kind: MovementKind;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  description?: string;
  reference?: string;
  transactionId: string;
  idempotencyKey?: string;
  /** On a REVERSAL: the movement it reverses */
  reversedMovementId?: string;
  /** On an original movement: set once a REVERSAL has been applied against it */
  reversed: boolean;
  correlationId?: string;
  requestId?: string;
  createdAt: Date;
}

/**
 * Signed effect of a movement on its account balance
 */
export const signedEffect = (movement: Pick<Movement, 'balanceBefore' | 'balanceAfter'>): number =>
  movement.balanceAfter - movement.balanceBefore;
