/**
 * Statement Aggregator
 *
 * Read-only. For each account of a customer, folds the movements created in
 * [start 00:00:00.000Z, end 23:59:59.999Z] into opening and closing balances
 * and credit/debit totals. Reversals count by their signed effect.
 *
 * The movements summary is a flatter report over the same kind of period:
 * counts and totals per kind plus average, largest and smallest amounts.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { traceLedgerOperation } from '../../observability/tracing';
import { LedgerStore } from '../../store/ledger.store';
import { Account, Movement, MovementKind, signedEffect } from '../../types/ledger';
import { formatMinorUnits } from '../../utils/money';
import { StatementPeriod, toStatementPeriod } from '../../utils/period';
import { AccountView, MovementView, toAccountView, toMovementView } from '../../utils/presenters';

const log = createServiceLogger('statement');

export type { StatementPeriod };
export { toStatementPeriod };

/**
 * Minor-unit totals for one account over one period
 */
export interface StatementFold {
  openingBalance: number;
  closingBalance: number;
  totalCredits: number;
  totalDebits: number;
  netChange: number;
}

export interface AccountStatement {
  account: AccountView;
  openingBalance: string;
  closingBalance: string;
  totalCredits: string;
  totalDebits: string;
  /** Newest first */
  movements: MovementView[];
}

export interface StatementReport {
  customerId: string;
  customerName: string;
  period: { startDate: string; endDate: string };
  generatedAt: string;
  perAccount: AccountStatement[];
  totals: {
    accounts: number;
    movements: number;
    totalCredits: string;
    totalDebits: string;
  };
  netChange: string;
}

export interface SummaryFold {
  movementCount: number;
  creditCount: number;
  debitCount: number;
  reversalCount: number;
  totalCredits: number;
  totalDebits: number;
  averageAmount: number;
  largestAmount: number;
  smallestAmount: number;
}

export interface SummaryScope {
  accountNumber?: number;
  customerId?: string;
}

export interface MovementsSummary extends SummaryScope {
  period: { startDate: string; endDate: string };
  movementCount: number;
  creditCount: number;
  debitCount: number;
  reversalCount: number;
  totalCredits: string;
  totalDebits: string;
  averageAmount: string;
  largestAmount: string;
  smallestAmount: string;
}

/**
 * Credit and debit totals take only CREDIT and DEBIT movements; the amount
 * statistics take every movement. The average rounds half up to the cent.
 */
export function foldSummary(movements: Movement[]): SummaryFold {
  const fold: SummaryFold = {
    movementCount: movements.length,
    creditCount: 0,
    debitCount: 0,
    reversalCount: 0,
    totalCredits: 0,
    totalDebits: 0,
    averageAmount: 0,
    largestAmount: 0,
    smallestAmount: 0,
  };
  if (movements.length === 0) {
    return fold;
  }

  let total = 0;
  fold.smallestAmount = Number.MAX_SAFE_INTEGER;
  for (const movement of movements) {
    if (movement.kind === MovementKind.CREDIT) {
      fold.creditCount++;
      fold.totalCredits += movement.amount;
    } else if (movement.kind === MovementKind.DEBIT) {
      fold.debitCount++;
      fold.totalDebits += movement.amount;
    } else {
      fold.reversalCount++;
    }
    total += movement.amount;
    fold.largestAmount = Math.max(fold.largestAmount, movement.amount);
    fold.smallestAmount = Math.min(fold.smallestAmount, movement.amount);
  }
  fold.averageAmount = Math.round(total / movements.length);
  return fold;
}

/**
 * Fold one account's in-range movements.
 *
 * Closing balance: the current balance when the period reaches now; otherwise
 * the balanceAfter of the last in-range movement, else the balanceBefore of
 * the first movement after the period, else the current balance.
 * Opening balance is closing minus the signed sum of the period.
 */
export function foldStatement(
  account: Account,
  inRange: Movement[],
  firstAfter: Movement | null,
  period: StatementPeriod,
  now: Date
): StatementFold {
  let totalCredits = 0;
  let totalDebits = 0;
  let lastInRange: Movement | null = null;

  for (const movement of inRange) {
    const effect = signedEffect(movement);
    if (effect > 0) {
      totalCredits += effect;
    } else {
      totalDebits -= effect;
    }
    if (!lastInRange || movement.createdAt.getTime() >= lastInRange.createdAt.getTime()) {
      lastInRange = movement;
    }
  }

  let closingBalance: number;
  if (period.to.getTime() >= now.getTime()) {
    closingBalance = account.balance;
  } else if (lastInRange) {
    closingBalance = lastInRange.balanceAfter;
  } else if (firstAfter) {
    closingBalance = firstAfter.balanceBefore;
  } else {
    closingBalance = account.balance;
  }

  const netChange = totalCredits - totalDebits;
  return {
    openingBalance: closingBalance - netChange,
    closingBalance,
    totalCredits,
    totalDebits,
    netChange,
  };
}

export class StatementService {
  constructor(
    private readonly store: LedgerStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async generateStatement(customerId: string, startDate: string, endDate: string): Promise<StatementReport> {
    const period = toStatementPeriod(startDate, endDate);

    return traceLedgerOperation('generate_statement', { 'ledger.customer_id': customerId }, async () => {
      const now = this.now();
      const accounts = await this.store.findAccountsByCustomer(customerId);

      const perAccount: AccountStatement[] = [];
      let movementCount = 0;
      let totalCredits = 0;
      let totalDebits = 0;

      for (const account of accounts) {
        const [inRangeDesc, after] = await Promise.all([
          this.store.findMovements(account.accountNumber, { from: period.from, to: period.to, order: 'desc' }),
          this.store.findMovements(account.accountNumber, {
            from: new Date(period.to.getTime() + 1),
            order: 'asc',
            limit: 1,
          }),
        ]);

        // Fold oldest first; the last element wins ties on createdAt
        const inRange = [...inRangeDesc].reverse();
        const fold = foldStatement(account, inRange, after[0] ?? null, period, now);

        movementCount += inRange.length;
        totalCredits += fold.totalCredits;
        totalDebits += fold.totalDebits;

        perAccount.push({
          account: toAccountView(account),
          openingBalance: formatMinorUnits(fold.openingBalance),
          closingBalance: formatMinorUnits(fold.closingBalance),
          totalCredits: formatMinorUnits(fold.totalCredits),
          totalDebits: formatMinorUnits(fold.totalDebits),
          movements: inRangeDesc.map(toMovementView),
        });
      }

      log.info({ customerId, accounts: accounts.length, movements: movementCount }, 'Statement generated');

      return {
        customerId,
        customerName: accounts[0]?.owner.name ?? '',
        period: { startDate, endDate },
        generatedAt: now.toISOString(),
        perAccount,
        totals: {
          accounts: accounts.length,
          movements: movementCount,
          totalCredits: formatMinorUnits(totalCredits),
          totalDebits: formatMinorUnits(totalDebits),
        },
        netChange: formatMinorUnits(totalCredits - totalDebits),
      };
    });
  }

  /**
   * Summary over one account or every account of a customer. With both, the
   * account must belong to the customer or nothing matches.
   */
  async summarizeMovements(scope: SummaryScope, startDate: string, endDate: string): Promise<MovementsSummary> {
    if (scope.accountNumber === undefined && scope.customerId === undefined) {
      throw ApiError.validationError('accountNumber or customerId is required');
    }
    const period = toStatementPeriod(startDate, endDate);

    const attributes: Record<string, string | number> = {};
    if (scope.accountNumber !== undefined) attributes['ledger.account_number'] = scope.accountNumber;
    if (scope.customerId !== undefined) attributes['ledger.customer_id'] = scope.customerId;

    return traceLedgerOperation('summarize_movements', attributes, async () => {
      const accountNumbers = await this.resolveScope(scope);
      const { items } = await this.store.searchMovements({ accountNumbers, from: period.from, to: period.to });
      const fold = foldSummary(items);

      log.info({ ...scope, movements: fold.movementCount }, 'Movements summary generated');

      return {
        ...scope,
        period: { startDate, endDate },
        movementCount: fold.movementCount,
        creditCount: fold.creditCount,
        debitCount: fold.debitCount,
        reversalCount: fold.reversalCount,
        totalCredits: formatMinorUnits(fold.totalCredits),
        totalDebits: formatMinorUnits(fold.totalDebits),
        averageAmount: formatMinorUnits(fold.averageAmount),
        largestAmount: formatMinorUnits(fold.largestAmount),
        smallestAmount: formatMinorUnits(fold.smallestAmount),
      };
    });
  }

  private async resolveScope(scope: SummaryScope): Promise<number[]> {
    if (scope.accountNumber === undefined) {
      const accounts = await this.store.findAccountsByCustomer(scope.customerId ?? '');
      return accounts.map((account) => account.accountNumber);
    }
    const account = await this.store.findAccount(scope.accountNumber);
    if (!account) {
      throw ApiError.notFound('account', scope.accountNumber);
    }
    if (scope.customerId !== undefined && account.owner.customerId !== scope.customerId) {
      return [];
    }
    return [account.accountNumber];
  }
}
