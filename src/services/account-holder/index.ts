export { AccountHolderService } from './account-holder.service';
export { AccountHolderController } from './account-holder.controller';
export { createAccountHolderRoutes } from './account-holder.routes';
