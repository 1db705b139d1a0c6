export { TransactionService, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './transaction.service';
export type { CreateTransactionDTO, TransactionFilters } from './transaction.service';
export { TransactionController } from './transaction.controller';
export { createTransactionRoutes } from './transaction.routes';
export { filtersFromQuery } from './transaction.filters';
export { amountField, descriptionField, listTransactionsQuery } from './transaction.validation';
