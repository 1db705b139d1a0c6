export { AccountService, generateAccountNumber } from './account.service';
export type { AccountLookup } from './account.service';
export { AccountController } from './account.controller';
export { createAccountRoutes } from './account.routes';
export { accountIdParam } from './account.validation';
