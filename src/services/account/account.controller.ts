import { Request, Response, NextFunction } from 'express';

import { AccountCategory } from '../../types/ledger';
import { formatMinorUnits } from '../../utils/money';
import { toAccountView, toMovementView } from '../../utils/presenters';
import { DEFAULT_MOVEMENT_LIMIT, MovementService } from '../movement/movement.service';

import { AccountService } from './account.service';

const parseCategory = (value: unknown): AccountCategory =>
  value === AccountCategory.CHECKING ? AccountCategory.CHECKING : AccountCategory.SAVINGS;

const optionalCategory = (value: unknown): AccountCategory | undefined =>
  Object.values(AccountCategory).find((category) => category === value);

const optionalBoolean = (value: unknown): boolean | undefined => {
  if (value === true || value === 'true') return true;
  if (value === false || value === 'false') return false;
  return undefined;
};

export class AccountController {
  constructor(
    private readonly accounts: AccountService,
    private readonly movements: MovementService
  ) {}

  /**
   * Open an account
   * POST /accounts
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, category } = req.body;
      const account = await this.accounts.createAccount(String(customerId), parseCategory(category));

      res.status(201).json({
        success: true,
        data: { account: toAccountView(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts?customerId=&category=&active=
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, category, active } = req.query;
      const accounts = await this.accounts.listAccounts({
        customerId: typeof customerId === 'string' && customerId.length > 0 ? customerId : undefined,
        category: optionalCategory(category),
        active: optionalBoolean(active),
      });

      res.status(200).json({
        success: true,
        data: {
          accounts: accounts.map(toAccountView),
          count: accounts.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /accounts/:accountNumber
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { category, active } = req.body;
      const account = await this.accounts.updateAccount(Number(req.params.accountNumber), {
        category: optionalCategory(category),
        active: optionalBoolean(active),
      });

      res.status(200).json({
        success: true,
        data: { account: toAccountView(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /accounts/:accountNumber/state
   */
  async updateState(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accounts.updateAccount(Number(req.params.accountNumber), {
        active: optionalBoolean(req.body.active),
      });

      res.status(200).json({
        success: true,
        data: { account: toAccountView(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountNumber
   */
  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accounts.getAccount(Number(req.params.accountNumber));

      res.status(200).json({
        success: true,
        data: { account: toAccountView(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountNumber/balance
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { accountNumber, balance, active } = await this.accounts.getBalance(Number(req.params.accountNumber));

      res.status(200).json({
        success: true,
        data: { accountNumber, balance: formatMinorUnits(balance), active },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Most recent movements, newest first
   * GET /accounts/:accountNumber/movements?limit=
   */
  async listMovements(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const limit = req.query.limit !== undefined ? Number(req.query.limit) : DEFAULT_MOVEMENT_LIMIT;
      const movements = await this.movements.listMovements(Number(req.params.accountNumber), limit);

      res.status(200).json({
        success: true,
        data: {
          movements: movements.map(toMovementView),
          count: movements.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /customers/:customerId/accounts
   */
  async listByCustomer(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const accounts = await this.accounts.listAccountsByCustomer(req.params.customerId);

      res.status(200).json({
        success: true,
        data: {
          accounts: accounts.map(toAccountView),
          count: accounts.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Soft delete by default, hard delete with ?hard=true
   * DELETE /accounts/:accountNumber
   */
  async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const hard = req.query.hard === 'true';
      const result = await this.accounts.deleteAccount(Number(req.params.accountNumber), hard);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /customers/:customerId/accounts
   */
  async deleteByCustomer(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId } = req.params;
      const deleted = await this.accounts.deleteAccountsByCustomer(customerId);

      res.status(200).json({
        success: true,
        data: { customerId, deleted },
      });
    } catch (error) {
      next(error);
    }
  }
}
