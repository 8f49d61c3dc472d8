export { AccountService, AccountServiceOptions, AccountDeletion } from './account.service';
export { AccountController } from './account.controller';
export { createAccountRoutes, createCustomerAccountRoutes } from './account.routes';
