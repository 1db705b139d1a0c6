/**
 * Ledger engine
 *
 * Everything that reads or moves money goes through here. Callers resolve
 * identity and ownership first; nothing in this module looks at roles.
 */

import { LedgerStore } from '../../stores';

import { BalanceEvaluator } from './balance.evaluator';
import { StatementAggregator } from './statement.aggregator';
import { TransactionAuthorizer } from './transaction.authorizer';
import { TransferCoordinator } from './transfer.coordinator';

export { lockOrder, lockInOrder } from './lock-order';
export { BalanceEvaluator, foldBalance } from './balance.evaluator';
export type { IntegrityReport } from './balance.evaluator';
export { TransactionAuthorizer } from './transaction.authorizer';
export type { AuthorizeRequest } from './transaction.authorizer';
export { TransferCoordinator } from './transfer.coordinator';
export type { TransferRequest } from './transfer.coordinator';
export {
  StatementAggregator,
  statementPeriod,
  MIN_STATEMENT_YEAR,
  MAX_STATEMENT_YEAR,
} from './statement.aggregator';
export type { StatementView, StatementPeriod } from './statement.aggregator';
export * from './ledger.outcomes';

export interface LedgerEngine {
  store: LedgerStore;
  evaluator: BalanceEvaluator;
  authorizer: TransactionAuthorizer;
  coordinator: TransferCoordinator;
  statements: StatementAggregator;
}

export const createLedgerEngine = (store: LedgerStore): LedgerEngine => {
  const evaluator = new BalanceEvaluator(store);
  return {
    store,
    evaluator,
    authorizer: new TransactionAuthorizer(store, evaluator),
    coordinator: new TransferCoordinator(store, evaluator),
    statements: new StatementAggregator(store, evaluator),
  };
};
