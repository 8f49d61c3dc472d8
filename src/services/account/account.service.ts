import { EventPublisher } from '../../events/eventPublisher';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { accountsCreatedTotal, accountsDeletedTotal } from '../../observability/metrics';
import { AccountChanges, AccountFilter, CascadeResult, LedgerStore, VersionConflictError } from '../../store/ledger.store';
import {
  AccountCreatedBody,
  AccountDeletedBody,
  AccountUpdatedBody,
  CustomerEvent,
  EventType,
} from '../../types/events';
import { Account, AccountCategory, AccountOwner } from '../../types/ledger';
import { formatMinorUnits } from '../../utils/money';
import { CustomerProjectionCache } from '../customer/customer.cache';

const log = createServiceLogger('account-service');

export interface AccountServiceOptions {
  maxActiveAccountsPerCustomer: number;
  openDefaultAccount: boolean;
  /** Retries after the first attempt when an update or delete races a movement */
  maxRetries: number;
  topic: string;
}

export interface AccountDeletion {
  accountNumber: number;
  hard: boolean;
  /** False when a soft delete found the account already inactive */
  changed: boolean;
  movementsDeleted: number;
}

type DeletionReason = AccountDeletedBody['reason'];

interface Removal {
  account: Account;
  result: CascadeResult;
}

export class AccountService {
  constructor(
    private readonly store: LedgerStore,
    private readonly customers: CustomerProjectionCache,
    private readonly publisher: EventPublisher,
    private readonly options: AccountServiceOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Open an account for a customer confirmed live against the customer service
   */
  async createAccount(customerId: string, category: AccountCategory): Promise<Account> {
    const customer = await this.customers.confirmCustomer(customerId);
    await this.enforceAccountRules(customerId, category);

    const account = await this.open({ customerId, name: customer.name }, category, 'command');
    log.info({ accountNumber: account.accountNumber, customerId, category }, 'Account created');
    return account;
  }

  /**
   * Default SAVINGS account for a customer announced by a created event.
   * The event is trusted; no live lookup is made. Returns null when nothing was opened.
   */
  async openDefaultAccount(event: CustomerEvent): Promise<Account | null> {
    if (!this.options.openDefaultAccount || !event.active) {
      return null;
    }
    if (await this.store.hasActiveAccountOfCategory(event.customerId, AccountCategory.SAVINGS)) {
      log.debug({ customerId: event.customerId }, 'Customer already has a savings account');
      return null;
    }

    const account = await this.open(
      { customerId: event.customerId, name: event.name ?? '' },
      AccountCategory.SAVINGS,
      'customer_event'
    );
    log.info({ accountNumber: account.accountNumber, customerId: event.customerId }, 'Default account opened');
    return account;
  }

  async getAccount(accountNumber: number): Promise<Account> {
    const account = await this.store.findAccount(accountNumber);
    if (!account) {
      throw ApiError.notFound('account', accountNumber);
    }
    return account;
  }

  async getBalance(accountNumber: number): Promise<{ accountNumber: number; balance: number; active: boolean }> {
    const account = await this.getAccount(accountNumber);
    return { accountNumber, balance: account.balance, active: account.active };
  }

  async listAccountsByCustomer(customerId: string): Promise<Account[]> {
    return this.store.findAccountsByCustomer(customerId);
  }

  async listAccounts(filter: AccountFilter): Promise<Account[]> {
    return this.store.findAccounts(filter);
  }

  /**
   * Change the category or the active flag. Reactivating, or moving an active
   * account to another category, is held to the same rules as opening one.
   */
  async updateAccount(accountNumber: number, changes: AccountChanges): Promise<Account> {
    for (let attempt = 1; ; attempt++) {
      const account = await this.getAccount(accountNumber);
      const diff: AccountChanges = {};
      if (changes.category !== undefined && changes.category !== account.category) diff.category = changes.category;
      if (changes.active !== undefined && changes.active !== account.active) diff.active = changes.active;
      if (diff.category === undefined && diff.active === undefined) {
        return account;
      }

      const category = diff.category ?? account.category;
      if (diff.active === true || (account.active && diff.category !== undefined)) {
        await this.customers.ensureCustomerActive(account.owner.customerId);
        await this.enforceAccountRules(account.owner.customerId, category, diff.active !== true);
      }

      let updated: Account;
      try {
        updated = await this.store.updateAccount(accountNumber, account.version, diff, this.now());
      } catch (error) {
        if (!(error instanceof VersionConflictError)) {
          throw error;
        }
        if (attempt > this.options.maxRetries) {
          throw ApiError.concurrentModification(accountNumber, attempt);
        }
        continue;
      }

      this.emitUpdated(updated);
      log.info({ accountNumber, changes: diff }, 'Account updated');
      return updated;
    }
  }

  /**
   * Soft delete deactivates the account; hard delete removes it with every
   * movement. A hard delete requested directly needs a zero balance.
   */
  async deleteAccount(accountNumber: number, hard: boolean): Promise<AccountDeletion> {
    return hard ? this.hardDelete(accountNumber) : this.softDelete(accountNumber);
  }

  /**
   * Cascade every account of a customer that no longer exists. Failures are
   * logged and skipped; the result counts the accounts actually removed.
   */
  async deleteAccountsByCustomer(customerId: string): Promise<number> {
    const accounts = await this.store.findAccountsByCustomer(customerId);
    if (accounts.length === 0) {
      log.info({ customerId }, 'No accounts to delete for customer');
      return 0;
    }

    const results = await Promise.allSettled(
      accounts.map(async (account) => {
        const removal = await this.removeAccount(account.accountNumber, false);
        if (removal) {
          accountsDeletedTotal.inc({ mode: 'cascade' });
          this.emitDeleted(removal.account, true, 'customer_deleted');
        }
        return removal !== null;
      })
    );

    let deleted = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        if (result.value) deleted++;
        return;
      }
      log.error(
        { err: result.reason, customerId, accountNumber: accounts[index].accountNumber },
        'Account deletion failed during customer cascade; skipped'
      );
    });

    log.info({ customerId, found: accounts.length, deleted }, 'Customer accounts deleted');
    return deleted;
  }

  /**
   * @param alreadyCounted the account being changed is one of the active ones
   */
  private async enforceAccountRules(
    customerId: string,
    category: AccountCategory,
    alreadyCounted: boolean = false
  ): Promise<void> {
    const [activeCount, hasCategory] = await Promise.all([
      this.store.countActiveAccounts(customerId),
      this.store.hasActiveAccountOfCategory(customerId, category),
    ]);

    if (!alreadyCounted && activeCount >= this.options.maxActiveAccountsPerCustomer) {
      throw ApiError.accountLimitReached(customerId, this.options.maxActiveAccountsPerCustomer);
    }
    if (hasCategory) {
      throw ApiError.duplicateCategory(customerId, category);
    }
  }

  private async open(owner: AccountOwner, category: AccountCategory, source: string): Promise<Account> {
    const account = await this.store.openAccount({ owner, category, now: this.now() });
    accountsCreatedTotal.inc({ source });

    const body: AccountCreatedBody = {
      accountNumber: account.accountNumber,
      customerId: owner.customerId,
      customerName: owner.name,
      category: account.category,
      balance: formatMinorUnits(account.balance),
      createdAt: account.createdAt.toISOString(),
    };
    this.publisher.emit(this.options.topic, account.accountNumber, EventType.ACCOUNT_CREATED, body);
    return account;
  }

  private async softDelete(accountNumber: number): Promise<AccountDeletion> {
    for (let attempt = 1; ; attempt++) {
      const account = await this.getAccount(accountNumber);
      if (!account.active) {
        return { accountNumber, hard: false, changed: false, movementsDeleted: 0 };
      }

      try {
        await this.store.updateAccount(accountNumber, account.version, { active: false }, this.now());
      } catch (error) {
        if (!(error instanceof VersionConflictError)) {
          throw error;
        }
        if (attempt > this.options.maxRetries) {
          throw ApiError.concurrentModification(accountNumber, attempt);
        }
        continue;
      }

      accountsDeletedTotal.inc({ mode: 'soft' });
      this.emitDeleted(account, false, 'request');
      log.info({ accountNumber }, 'Account deactivated');
      return { accountNumber, hard: false, changed: true, movementsDeleted: 0 };
    }
  }

  private async hardDelete(accountNumber: number): Promise<AccountDeletion> {
    const removal = await this.removeAccount(accountNumber, true);
    if (!removal) {
      throw ApiError.notFound('account', accountNumber);
    }

    const { movementsDeleted } = removal.result;
    accountsDeletedTotal.inc({ mode: 'hard' });
    this.emitDeleted(removal.account, true, 'request');
    log.info({ accountNumber, movementsDeleted }, 'Account deleted');
    return { accountNumber, hard: true, changed: true, movementsDeleted };
  }

  /**
   * Delete against the version that was read, so a movement committed in
   * between sends us back to re-read (and re-check the balance).
   * Null when the account is already gone.
   */
  private async removeAccount(accountNumber: number, requireZeroBalance: boolean): Promise<Removal | null> {
    for (let attempt = 1; ; attempt++) {
      const account = await this.store.findAccount(accountNumber);
      if (!account) {
        return null;
      }
      if (requireZeroBalance && account.balance !== 0) {
        throw ApiError.accountHasBalance(accountNumber, formatMinorUnits(account.balance));
      }

      try {
        const result = await this.store.deleteAccountCascade(accountNumber, account.version);
        return result.deleted ? { account, result } : null;
      } catch (error) {
        if (!(error instanceof VersionConflictError)) {
          throw error;
        }
        if (attempt > this.options.maxRetries) {
          throw ApiError.concurrentModification(accountNumber, attempt);
        }
        log.debug({ accountNumber, attempt }, 'Account changed during delete; retrying');
      }
    }
  }

  private emitUpdated(account: Account): void {
    const body: AccountUpdatedBody = {
      accountNumber: account.accountNumber,
      customerId: account.owner.customerId,
      category: account.category,
      balance: formatMinorUnits(account.balance),
      active: account.active,
      version: account.version,
      updatedAt: account.updatedAt.toISOString(),
    };
    this.publisher.emit(this.options.topic, account.accountNumber, EventType.ACCOUNT_UPDATED, body);
  }

  private emitDeleted(account: Account, hard: boolean, reason: DeletionReason): void {
    const body: AccountDeletedBody = {
      accountNumber: account.accountNumber,
      customerId: account.owner.customerId,
      hard,
      reason,
      deletedAt: this.now().toISOString(),
    };
    this.publisher.emit(this.options.topic, account.accountNumber, EventType.ACCOUNT_DELETED, body);
  }
}
