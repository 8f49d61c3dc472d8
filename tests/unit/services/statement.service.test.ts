/**
 * Statement Aggregator Unit Tests
 */

import { foldStatement, foldSummary, toStatementPeriod } from '../../../src/services/statement/statement.service';
import { ErrorCode } from '../../../src/types/errors';
import { Account, AccountCategory, Movement, MovementKind } from '../../../src/types/ledger';
import { createTestLedger, TestLedger } from '../../helpers/testLedger';

describe('toStatementPeriod', () => {
  it('should cover whole UTC days with inclusive ends', () => {
    const period = toStatementPeriod('2024-03-05', '2024-03-06');

    expect(period.from.toISOString()).toBe('2024-03-05T00:00:00.000Z');
    expect(period.to.toISOString()).toBe('2024-03-06T23:59:59.999Z');
  });

  it('should reject impossible dates and reversed ranges', () => {
    expect(() => toStatementPeriod('2024-02-30', '2024-03-01')).toThrow(
      'startDate must be a date in YYYY-MM-DD format'
    );
    expect(() => toStatementPeriod('2024-03-01', '03/05/2024')).toThrow('endDate must be a date in YYYY-MM-DD format');
    expect(() => toStatementPeriod('2024-03-06', '2024-03-05')).toThrow('startDate must not be after endDate');
  });
});

describe('foldSummary', () => {
  const movement = (kind: MovementKind, amount: number): Movement => ({
    movementId: `m-${kind}-${amount}`,
    accountNumber: 1,
    kind,
    amount,
    balanceBefore: 0,
    balanceAfter: 0,
    transactionId: `t-${kind}-${amount}`,
    reversed: false,
    createdAt: new Date('2024-03-01T10:00:00.000Z'),
  });

  it('should keep reversals out of the kind totals but in the amount statistics', () => {
    const fold = foldSummary([
      movement(MovementKind.CREDIT, 1),
      movement(MovementKind.DEBIT, 2),
      movement(MovementKind.REVERSAL, 2),
      movement(MovementKind.CREDIT, 4),
    ]);

    expect(fold).toEqual({
      movementCount: 4,
      creditCount: 2,
      debitCount: 1,
      reversalCount: 1,
      totalCredits: 5,
      totalDebits: 2,
      averageAmount: 2,
      largestAmount: 4,
      smallestAmount: 1,
    });
  });

  it('should round the average half up', () => {
    expect(foldSummary([movement(MovementKind.CREDIT, 1), movement(MovementKind.CREDIT, 2)]).averageAmount).toBe(2);
  });

  it('should answer zeros without movements', () => {
    expect(foldSummary([])).toMatchObject({ movementCount: 0, averageAmount: 0, smallestAmount: 0 });
  });
});

describe('foldStatement', () => {
  const account: Account = {
    accountNumber: 1,
    owner: { customerId: 'cust-1', name: 'Ada' },
    category: AccountCategory.SAVINGS,
    balance: 5000,
    active: true,
    version: 3,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: new Date('2024-03-10T00:00:00.000Z'),
  };
  const period = toStatementPeriod('2024-03-01', '2024-03-02');
  const now = new Date('2024-04-01T00:00:00.000Z');

  const movement = (balanceBefore: number, balanceAfter: number, kind: MovementKind): Movement => ({
    movementId: `m-${balanceBefore}-${balanceAfter}`,
    accountNumber: 1,
    kind,
    amount: Math.abs(balanceAfter - balanceBefore),
    balanceBefore,
    balanceAfter,
    transactionId: `t-${balanceBefore}-${balanceAfter}`,
    reversed: false,
    createdAt: new Date('2024-03-10T00:00:00.000Z'),
  });

  it('should take the closing balance from the first later movement when the period is empty', () => {
    const later = movement(4000, 5000, MovementKind.CREDIT);

    expect(foldStatement(account, [], later, period, now)).toEqual({
      openingBalance: 4000,
      closingBalance: 4000,
      totalCredits: 0,
      totalDebits: 0,
      netChange: 0,
    });
  });

  it('should fall back to the current balance when nothing moved since', () => {
    expect(foldStatement(account, [], null, period, now).closingBalance).toBe(5000);
  });

  it('should count reversals by their signed effect', () => {
    const inRange = [
      movement(0, 3000, MovementKind.CREDIT),
      movement(3000, 2000, MovementKind.DEBIT),
      movement(2000, 3000, MovementKind.REVERSAL),
    ];

    expect(foldStatement(account, inRange, null, period, now)).toEqual({
      openingBalance: 0,
      closingBalance: 3000,
      totalCredits: 4000,
      totalDebits: 1000,
      netChange: 3000,
    });
  });
});

describe('StatementService', () => {
  let ledger: TestLedger;
  let accountNumber: number;

  const move = async (iso: string, kind: MovementKind, amount: number, transactionId: string) => {
    ledger.clock.set(iso);
    return ledger.container.movementService.applyMovement({ accountNumber, kind, amount, transactionId });
  };

  const statement = (startDate: string, endDate: string) =>
    ledger.container.statementService.generateStatement('cust-1', startDate, endDate);

  beforeEach(async () => {
    ledger = createTestLedger();
    ledger.directory.set('cust-1', 'Ada');
    accountNumber = (await ledger.container.accountService.createAccount('cust-1', AccountCategory.SAVINGS))
      .accountNumber;

    await move('2024-03-01T12:00:00.000Z', MovementKind.CREDIT, 10000, 't1');
    await move('2024-03-05T10:00:00.000Z', MovementKind.DEBIT, 3000, 't2');
    await move('2024-03-10T09:00:00.000Z', MovementKind.CREDIT, 5000, 't3');
    ledger.clock.set('2024-03-20T00:00:00.000Z');
  });

  it('should fold a single past day', async () => {
    const report = await statement('2024-03-05', '2024-03-05');

    expect(report).toMatchObject({
      customerId: 'cust-1',
      customerName: 'Ada',
      period: { startDate: '2024-03-05', endDate: '2024-03-05' },
      generatedAt: '2024-03-20T00:00:00.000Z',
      totals: { accounts: 1, movements: 1, totalCredits: '0.00', totalDebits: '30.00' },
      netChange: '-30.00',
    });
    expect(report.perAccount[0]).toMatchObject({
      openingBalance: '100.00',
      closingBalance: '70.00',
      totalCredits: '0.00',
      totalDebits: '30.00',
    });
    expect(report.perAccount[0].movements.map((m) => m.transactionId)).toEqual(['t2']);
  });

  it('should carry balances across a quiet period', async () => {
    const report = await statement('2024-03-06', '2024-03-08');

    expect(report.perAccount[0]).toMatchObject({
      openingBalance: '70.00',
      closingBalance: '70.00',
      movements: [],
    });
  });

  it('should close on the current balance when the period reaches today', async () => {
    const report = await statement('2024-03-01', '2024-03-31');

    expect(report.perAccount[0]).toMatchObject({
      openingBalance: '0.00',
      closingBalance: '120.00',
      totalCredits: '150.00',
      totalDebits: '30.00',
    });
    expect(report.perAccount[0].movements.map((m) => m.transactionId)).toEqual(['t3', 't2', 't1']);
    expect(report.netChange).toBe('120.00');
  });

  it('should include movements at the last millisecond of the end day', async () => {
    await move('2024-03-11T23:59:59.999Z', MovementKind.CREDIT, 100, 't4');
    await move('2024-03-12T00:00:00.000Z', MovementKind.CREDIT, 100, 't5');
    ledger.clock.set('2024-03-20T00:00:00.000Z');

    const report = await statement('2024-03-11', '2024-03-11');

    expect(report.perAccount[0].movements.map((m) => m.transactionId)).toEqual(['t4']);
    expect(report.perAccount[0]).toMatchObject({ openingBalance: '120.00', closingBalance: '121.00' });
  });

  it('should count a reversal of a debit as a credit', async () => {
    const [debit] = await ledger.store.findMovements(accountNumber, {
      from: new Date('2024-03-05T00:00:00.000Z'),
      to: new Date('2024-03-05T23:59:59.999Z'),
      order: 'asc',
    });
    ledger.clock.set('2024-03-15T08:00:00.000Z');
    await ledger.container.movementService.reverseMovement({ movementId: debit.movementId, transactionId: 'r1' });
    ledger.clock.set('2024-03-20T00:00:00.000Z');

    const report = await statement('2024-03-15', '2024-03-15');

    expect(report.perAccount[0]).toMatchObject({
      openingBalance: '120.00',
      closingBalance: '150.00',
      totalCredits: '30.00',
      totalDebits: '0.00',
    });
  });

  it('should include inactive accounts', async () => {
    await ledger.container.accountService.deleteAccount(accountNumber, false);

    const report = await statement('2024-03-05', '2024-03-05');

    expect(report.perAccount[0].account.active).toBe(false);
  });

  it('should return an empty report for a customer without accounts', async () => {
    const report = await ledger.container.statementService.generateStatement('cust-9', '2024-03-01', '2024-03-31');

    expect(report).toMatchObject({
      customerId: 'cust-9',
      customerName: '',
      perAccount: [],
      totals: { accounts: 0, movements: 0, totalCredits: '0.00', totalDebits: '0.00' },
      netChange: '0.00',
    });
  });

  it('should reject invalid ranges', async () => {
    await expect(statement('2024-03-10', '2024-03-01')).rejects.toMatchObject({
      errorCode: ErrorCode.VALIDATION_ERROR,
    });
  });
});
