import { Account, Movement } from '../types/ledger';
import { formatMinorUnits } from './money';

/**
 * Wire shapes for REST responses and event bodies: money as decimal strings,
 * timestamps as ISO-8601.
 */

export interface AccountView {
  accountNumber: number;
  customerId: string;
  customerName: string;
  category: string;
  balance: string;
  active: boolean;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface MovementView {
  movementId: string;
  accountNumber: number;
  kind: string;
  amount: string;
  balanceBefore: string;
  balanceAfter: string;
  description?: string;
  reference?: string;
  transactionId: string;
  idempotencyKey?: string;
  reversedMovementId?: string;
  reversed: boolean;
  correlationId?: string;
  createdAt: string;
}

export const toAccountView = (account: Account): AccountView => ({
  accountNumber: account.accountNumber,
  customerId: account.owner.customerId,
  customerName: account.owner.name,
  category: account.category,
  balance: formatMinorUnits(account.balance),
  active: account.active,
  version: account.version,
  createdAt: account.createdAt.toISOString(),
  updatedAt: account.updatedAt.toISOString(),
});

export const toMovementView = (movement: Movement): MovementView => ({
  movementId: movement.movementId,
  accountNumber: movement.accountNumber,
  kind: movement.kind,
  amount: formatMinorUnits(movement.amount),
  balanceBefore: formatMinorUnits(movement.balanceBefore),
  balanceAfter: formatMinorUnits(movement.balanceAfter),
  description: movement.description,
  reference: movement.reference,
  transactionId: movement.transactionId,
  idempotencyKey: movement.idempotencyKey,
  reversedMovementId: movement.reversedMovementId,
  reversed: movement.reversed,
  correlationId: movement.correlationId,
  createdAt: movement.createdAt.toISOString(),
});
