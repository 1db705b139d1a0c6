import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  ledgerAmount,
  ledgerTransactionsTotal,
  traceLedgerOperation,
} from '../../observability';
import { UnitOfWork, LedgerStore } from '../../stores';
import { TransactionStatus, TransactionType } from '../../types/ledger';

import { BalanceEvaluator } from './balance.evaluator';
import { assertCreditFits, assertPositiveAmount, assertTransactionType } from './ledger.guards';
import { AuthorizationResult } from './ledger.outcomes';

const log = createServiceLogger('transaction-authorizer');

export interface AuthorizeRequest {
  accountId: string;
  type: TransactionType;
  amount: number;
  description?: string | null;
  cardId?: string | null;
}

/**
 * Decides single credits and debits against one account.
 *
 * The decision is returned, not thrown: an underfunded debit resolves to a
 * declined outcome and its row commits with the unit of work. Only systemic
 * failures reject, and those roll the unit back.
 */
export class TransactionAuthorizer {
  constructor(
    private readonly store: LedgerStore,
    private readonly evaluator: BalanceEvaluator
  ) {}

  async authorize(request: AuthorizeRequest): Promise<AuthorizationResult> {
    const { accountId, type, amount } = request;
    const description = request.description ?? null;
    const cardId = request.cardId ?? null;

    assertTransactionType(type);
    assertPositiveAmount(amount);
    if (cardId && type === TransactionType.CREDIT) {
      throw ApiError.cardNotUsable('Cards cannot be used for credit transactions');
    }

    return traceLedgerOperation('authorize', { accountId, type, amount }, async (span) => {
      const result = await this.store.runUnitOfWork<AuthorizationResult>(async (uow) => {
        const account = await uow.lockAccount(accountId);
        if (!account) {
          throw ApiError.notFound('account', accountId);
        }
        if (cardId) {
          await this.assertCardUsable(uow, cardId, accountId);
        }

        const balance = await this.evaluator.computeBalance(accountId, uow);
        const isDebit = type === TransactionType.DEBIT;
        const declined = isDebit && amount > balance;
        if (!isDebit) {
          assertCreditFits(balance, amount);
        }

        const transaction = await uow.insertTransaction({
          type,
          amount,
          fromAccountId: isDebit ? accountId : null,
          toAccountId: isDebit ? null : accountId,
          status: declined ? TransactionStatus.DECLINED : TransactionStatus.APPROVED,
          description,
          transferPairId: null,
          cardId,
        });

        if (declined) {
          return { outcome: 'declined', reason: 'insufficient_funds', transaction, balance };
        }

        const newBalance = isDebit ? balance - amount : balance + amount;
        await uow.setCachedBalance(accountId, newBalance);
        return { outcome: 'approved', transaction, balance: newBalance };
      });

      span.setAttribute('ledger.outcome', result.outcome);
      ledgerTransactionsTotal.inc({ type, status: result.transaction.status });
      if (result.outcome === 'approved') {
        ledgerAmount.observe({ operation: type }, amount);
      }

      log.info(
        {
          accountId,
          transactionId: result.transaction.id,
          type,
          amount,
          outcome: result.outcome,
          balance: result.balance,
        },
        result.outcome === 'approved' ? 'Transaction approved' : 'Transaction declined'
      );

      return result;
    });
  }

  private async assertCardUsable(uow: UnitOfWork, cardId: string, accountId: string): Promise<void> {
    const card = await uow.findCard(cardId);
    if (!card) {
      throw ApiError.notFound('card', cardId);
    }
    if (card.accountId !== accountId) {
      throw ApiError.cardNotUsable('Card does not belong to this account');
    }
    if (!card.isActive) {
      throw ApiError.cardNotUsable('Card is not active');
    }
  }
}
