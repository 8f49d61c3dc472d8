import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { AccountController } from './account.controller';
import {
  accountNumberValidation,
  createAccountValidation,
  customerIdValidation,
  deleteAccountValidation,
  listAccountsValidation,
  listMovementsValidation,
  updateAccountValidation,
  updateStateValidation,
} from './account.validation';

/**
 * Mounted at /accounts
 */
export const createAccountRoutes = (controller: AccountController): Router => {
  const router = Router();

  // POST /accounts - Open an account
  router.post('/', createAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.create(req, res, next)
  );

  // GET /accounts?customerId=&category=&active= - List accounts
  router.get('/', listAccountsValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.list(req, res, next)
  );

  // GET /accounts/:accountNumber - Get account
  router.get('/:accountNumber', accountNumberValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.get(req, res, next)
  );

  // GET /accounts/:accountNumber/balance - Get balance
  router.get(
    '/:accountNumber/balance',
    accountNumberValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getBalance(req, res, next)
  );

  // GET /accounts/:accountNumber/movements - Recent movements
  router.get(
    '/:accountNumber/movements',
    listMovementsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listMovements(req, res, next)
  );

  // PATCH /accounts/:accountNumber - Change category or active flag
  router.patch('/:accountNumber', updateAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.update(req, res, next)
  );

  // PATCH /accounts/:accountNumber/state - Activate or deactivate
  router.patch(
    '/:accountNumber/state',
    updateStateValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.updateState(req, res, next)
  );

  // DELETE /accounts/:accountNumber?hard=true - Delete account
  router.delete('/:accountNumber', deleteAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.delete(req, res, next)
  );

  return router;
};

/**
 * Mounted at /customers
 */
export const createCustomerAccountRoutes = (controller: AccountController): Router => {
  const router = Router();

  // GET /customers/:customerId/accounts - List a customer's accounts
  router.get('/:customerId/accounts', customerIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.listByCustomer(req, res, next)
  );

  // DELETE /customers/:customerId/accounts - Cascade delete a customer's accounts
  router.delete(
    '/:customerId/accounts',
    customerIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.deleteByCustomer(req, res, next)
  );

  return router;
};
