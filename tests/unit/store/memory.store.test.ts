/**
 * In-memory Ledger Store Unit Tests
 */

import { DuplicateKeyError, VersionConflictError } from '../../../src/store/ledger.store';
import { InMemoryLedgerStore } from '../../../src/store/memory.store';
import { AccountCategory, Movement, MovementKind } from '../../../src/types/ledger';

const at = (iso: string): Date => new Date(iso);

const movement = (overrides: Partial<Movement>): Movement => ({
  movementId: 'm-1',
  accountNumber: 1,
  kind: MovementKind.CREDIT,
  amount: 1000,
  balanceBefore: 0,
  balanceAfter: 1000,
  transactionId: 'txn-1',
  reversed: false,
  createdAt: at('2024-03-01T10:00:00.000Z'),
  ...overrides,
});

describe('InMemoryLedgerStore', () => {
  let store: InMemoryLedgerStore;

  beforeEach(() => {
    store = new InMemoryLedgerStore();
  });

  const openAccount = () =>
    store.openAccount({
      owner: { customerId: 'cust-1', name: 'Ada' },
      category: AccountCategory.SAVINGS,
      now: at('2024-03-01T09:00:00.000Z'),
    });

  describe('openAccount', () => {
    it('should allocate increasing account numbers starting at 1', async () => {
      const first = await openAccount();
      const second = await openAccount();

      expect(first.accountNumber).toBe(1);
      expect(second.accountNumber).toBe(2);
      expect(first).toMatchObject({ balance: 0, active: true, version: 0 });
    });

    it('should not reuse numbers after a cascade delete', async () => {
      await openAccount();
      await store.deleteAccountCascade(1);
      const next = await openAccount();

      expect(next.accountNumber).toBe(2);
    });
  });

  it('should return copies that callers cannot mutate', async () => {
    const account = await openAccount();
    account.balance = 999;
    account.owner.name = 'Mallory';

    const stored = await store.findAccount(1);
    expect(stored?.balance).toBe(0);
    expect(stored?.owner.name).toBe('Ada');
  });

  describe('commitMovement', () => {
    it('should apply balance, version and movement together', async () => {
      await openAccount();

      const account = await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 0,
        balanceAfter: 1000,
        movement: movement({}),
      });

      expect(account).toMatchObject({ balance: 1000, version: 1 });
      expect(await store.findMovementByTransactionId('txn-1')).toMatchObject({ movementId: 'm-1' });
    });

    it('should reject a stale version without writing anything', async () => {
      await openAccount();
      await store.commitMovement({ accountNumber: 1, expectedVersion: 0, balanceAfter: 1000, movement: movement({}) });

      await expect(
        store.commitMovement({
          accountNumber: 1,
          expectedVersion: 0,
          balanceAfter: 500,
          movement: movement({ movementId: 'm-2', transactionId: 'txn-2' }),
        })
      ).rejects.toBeInstanceOf(VersionConflictError);

      expect((await store.findAccount(1))?.balance).toBe(1000);
      expect(await store.findMovement('m-2')).toBeNull();
    });

    it('should reject duplicate transaction ids and idempotency keys', async () => {
      await openAccount();
      await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 0,
        balanceAfter: 1000,
        movement: movement({ idempotencyKey: 'key-1' }),
      });

      await expect(
        store.commitMovement({
          accountNumber: 1,
          expectedVersion: 1,
          balanceAfter: 2000,
          movement: movement({ movementId: 'm-2' }),
        })
      ).rejects.toMatchObject({ field: 'transactionId', value: 'txn-1' });

      await expect(
        store.commitMovement({
          accountNumber: 1,
          expectedVersion: 1,
          balanceAfter: 2000,
          movement: movement({ movementId: 'm-3', transactionId: 'txn-3', idempotencyKey: 'key-1' }),
        })
      ).rejects.toBeInstanceOf(DuplicateKeyError);
    });

    it('should flag the reversed movement in the same unit', async () => {
      await openAccount();
      await store.commitMovement({ accountNumber: 1, expectedVersion: 0, balanceAfter: 1000, movement: movement({}) });

      await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 1,
        balanceAfter: 0,
        movement: movement({
          movementId: 'm-2',
          transactionId: 'txn-2',
          kind: MovementKind.REVERSAL,
          balanceBefore: 1000,
          balanceAfter: 0,
          reversedMovementId: 'm-1',
        }),
      });

      expect((await store.findMovement('m-1'))?.reversed).toBe(true);
    });

    it('should treat a second reversal of the same movement as a conflict', async () => {
      await openAccount();
      await store.commitMovement({ accountNumber: 1, expectedVersion: 0, balanceAfter: 1000, movement: movement({}) });
      const reversal = {
        kind: MovementKind.REVERSAL,
        balanceBefore: 1000,
        balanceAfter: 0,
        reversedMovementId: 'm-1',
      };
      await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 1,
        balanceAfter: 0,
        movement: movement({ ...reversal, movementId: 'm-2', transactionId: 'txn-2' }),
      });

      await expect(
        store.commitMovement({
          accountNumber: 1,
          expectedVersion: 2,
          balanceAfter: -1000,
          movement: movement({ ...reversal, movementId: 'm-3', transactionId: 'txn-3' }),
        })
      ).rejects.toBeInstanceOf(VersionConflictError);
      expect((await store.findAccount(1))?.version).toBe(2);
    });
  });

  describe('findMovements', () => {
    beforeEach(async () => {
      await openAccount();
      const times = ['2024-03-01T10:00:00.000Z', '2024-03-02T10:00:00.000Z', '2024-03-03T10:00:00.000Z'];
      for (const [index, time] of times.entries()) {
        await store.commitMovement({
          accountNumber: 1,
          expectedVersion: index,
          balanceAfter: (index + 1) * 100,
          movement: movement({
            movementId: `m-${index + 1}`,
            transactionId: `txn-${index + 1}`,
            amount: 100,
            balanceBefore: index * 100,
            balanceAfter: (index + 1) * 100,
            createdAt: at(time),
          }),
        });
      }
    });

    it('should order newest first and apply the limit', async () => {
      const result = await store.findMovements(1, { order: 'desc', limit: 2 });
      expect(result.map((m) => m.movementId)).toEqual(['m-3', 'm-2']);
    });

    it('should filter by inclusive time bounds', async () => {
      const result = await store.findMovements(1, {
        from: at('2024-03-02T10:00:00.000Z'),
        to: at('2024-03-03T10:00:00.000Z'),
        order: 'asc',
      });
      expect(result.map((m) => m.movementId)).toEqual(['m-2', 'm-3']);
    });

    it('should keep commit order for movements in the same millisecond', async () => {
      await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 3,
        balanceAfter: 250,
        movement: movement({
          movementId: 'm-4',
          transactionId: 'txn-4',
          kind: MovementKind.DEBIT,
          amount: 50,
          balanceBefore: 300,
          balanceAfter: 250,
          createdAt: at('2024-03-03T10:00:00.000Z'),
        }),
      });

      const asc = await store.findMovements(1, { order: 'asc' });
      const desc = await store.findMovements(1, { order: 'desc' });
      expect(asc.map((m) => m.movementId)).toEqual(['m-1', 'm-2', 'm-3', 'm-4']);
      expect(desc.map((m) => m.movementId)).toEqual(['m-4', 'm-3', 'm-2', 'm-1']);
    });
  });

  it('should cascade movements with the account', async () => {
    await openAccount();
    await store.commitMovement({
      accountNumber: 1,
      expectedVersion: 0,
      balanceAfter: 1000,
      movement: movement({ idempotencyKey: 'key-1' }),
    });

    expect(await store.deleteAccountCascade(1)).toEqual({ deleted: true, movementsDeleted: 1 });
    expect(await store.findAccount(1)).toBeNull();
    expect(await store.findMovementByTransactionId('txn-1')).toBeNull();
    expect(await store.findMovementByIdempotencyKey('key-1')).toBeNull();
    expect(await store.deleteAccountCascade(1)).toEqual({ deleted: false, movementsDeleted: 0 });
  });

  it('should remove an account only at the version it was read', async () => {
    await openAccount();
    await store.commitMovement({ accountNumber: 1, expectedVersion: 0, balanceAfter: 1000, movement: movement({}) });

    await expect(store.deleteAccountCascade(1, 0)).rejects.toBeInstanceOf(VersionConflictError);
    expect(await store.findAccount(1)).not.toBeNull();
    expect(await store.findMovement('m-1')).not.toBeNull();

    expect(await store.deleteAccountCascade(1, 1)).toEqual({ deleted: true, movementsDeleted: 1 });
  });

  it('should count only active accounts per customer', async () => {
    await openAccount();
    await store.openAccount({
      owner: { customerId: 'cust-1', name: 'Ada' },
      category: AccountCategory.CHECKING,
      now: at('2024-03-01T09:00:00.000Z'),
    });
    const closed = await store.updateAccount(1, 0, { active: false }, at('2024-03-01T11:00:00.000Z'));

    expect(closed).toMatchObject({ active: false, version: 1, updatedAt: at('2024-03-01T11:00:00.000Z') });
    expect(await store.countActiveAccounts('cust-1')).toBe(1);
    expect(await store.hasActiveAccountOfCategory('cust-1', AccountCategory.SAVINGS)).toBe(false);
    expect(await store.hasActiveAccountOfCategory('cust-1', AccountCategory.CHECKING)).toBe(true);
    await expect(store.updateAccount(1, 0, { active: true }, at('2024-03-01T12:00:00.000Z'))).rejects.toBeInstanceOf(
      VersionConflictError
    );
  });

  it('should filter accounts by owner, category and state', async () => {
    await openAccount();
    await store.openAccount({
      owner: { customerId: 'cust-1', name: 'Ada' },
      category: AccountCategory.CHECKING,
      now: at('2024-03-01T09:00:00.000Z'),
    });
    await store.updateAccount(1, 0, { active: false }, at('2024-03-01T11:00:00.000Z'));

    const active = await store.findAccounts({ active: true });
    const savings = await store.findAccounts({ customerId: 'cust-1', category: AccountCategory.SAVINGS });

    expect(active.map((account) => account.accountNumber)).toEqual([2]);
    expect(savings.map((account) => account.accountNumber)).toEqual([1]);
    expect(await store.findAccounts({ customerId: 'cust-2' })).toEqual([]);
  });

  describe('searchMovements', () => {
    beforeEach(async () => {
      await openAccount();
      await openAccount();
      await store.commitMovement({ accountNumber: 1, expectedVersion: 0, balanceAfter: 1000, movement: movement({}) });
      await store.commitMovement({
        accountNumber: 1,
        expectedVersion: 1,
        balanceAfter: 500,
        movement: movement({
          movementId: 'm-2',
          kind: MovementKind.DEBIT,
          amount: 500,
          balanceBefore: 1000,
          balanceAfter: 500,
          transactionId: 'txn-2',
          createdAt: at('2024-03-01T11:00:00.000Z'),
        }),
      });
      await store.commitMovement({
        accountNumber: 2,
        expectedVersion: 0,
        balanceAfter: 1000,
        movement: movement({
          movementId: 'm-3',
          accountNumber: 2,
          transactionId: 'txn-3',
          createdAt: at('2024-03-01T12:00:00.000Z'),
        }),
      });
    });

    const ids = (page: { items: Movement[] }) => page.items.map((item) => item.movementId);

    it('should page newest first with the total count', async () => {
      const page = await store.searchMovements({ accountNumbers: [1] }, { offset: 0, limit: 1 });

      expect(ids(page)).toEqual(['m-2']);
      expect(page.total).toBe(2);
    });

    it('should filter by kind and time range', async () => {
      expect(ids(await store.searchMovements({ kind: MovementKind.CREDIT }))).toEqual(['m-3', 'm-1']);
      expect(
        ids(
          await store.searchMovements({
            from: at('2024-03-01T10:30:00.000Z'),
            to: at('2024-03-01T11:30:00.000Z'),
          })
        )
      ).toEqual(['m-2']);
    });

    it('should find nothing for an empty account list', async () => {
      expect(await store.searchMovements({ accountNumbers: [] })).toEqual({ items: [], total: 0 });
    });
  });
});
