import { v4 as uuid } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  ledgerAmount,
  ledgerTransfersTotal,
  traceLedgerOperation,
} from '../../observability';
import { LedgerStore } from '../../stores';
import { TransactionStatus, TransactionType } from '../../types/ledger';

import { BalanceEvaluator } from './balance.evaluator';
import { assertCreditFits, assertPositiveAmount } from './ledger.guards';
import { TransferResult } from './ledger.outcomes';
import { lockInOrder } from './lock-order';

const log = createServiceLogger('transfer-coordinator');

export interface TransferRequest {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  description?: string | null;
  /** When set, the source account must belong to this holder */
  expectedSourceHolderId?: string;
}

/**
 * Moves money between two accounts as one unit of work: a debit leg on the
 * source and a credit leg on the destination, or a single declined debit-shaped
 * row on the source when it cannot cover the amount.
 */
export class TransferCoordinator {
  constructor(
    private readonly store: LedgerStore,
    private readonly evaluator: BalanceEvaluator
  ) {}

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const { fromAccountId, toAccountId, amount } = request;
    const description = request.description ?? null;

    assertPositiveAmount(amount);
    if (fromAccountId === toAccountId) {
      throw ApiError.sameAccountTransfer();
    }

    return traceLedgerOperation(
      'transfer',
      { fromAccountId, toAccountId, amount },
      async (span) => {
        const result = await this.store.runUnitOfWork<TransferResult>(async (uow) => {
          const locked = await lockInOrder([fromAccountId, toAccountId], (id) =>
            uow.lockAccount(id)
          );
          const source = locked.get(fromAccountId);
          const destination = locked.get(toAccountId);
          if (!source) {
            throw ApiError.notFound('account', fromAccountId);
          }
          if (!destination) {
            throw ApiError.notFound('account', toAccountId);
          }
          if (
            request.expectedSourceHolderId !== undefined &&
            source.accountHolderId !== request.expectedSourceHolderId
          ) {
            throw ApiError.forbidden('You do not have access to the source account');
          }

          const sourceBalance = await this.evaluator.computeBalance(fromAccountId, uow);

          if (amount > sourceBalance) {
            const debitTransaction = await uow.insertTransaction({
              type: TransactionType.DEBIT,
              amount,
              fromAccountId,
              toAccountId: null,
              status: TransactionStatus.DECLINED,
              description,
              transferPairId: null,
              cardId: null,
            });
            return {
              outcome: 'declined',
              reason: 'insufficient_funds',
              debitTransaction,
              amount,
              fromAccountId,
              toAccountId,
            };
          }

          const destinationBalance = await this.evaluator.computeBalance(toAccountId, uow);
          assertCreditFits(destinationBalance, amount);
          const transferPairId = uuid();

          const debitTransaction = await uow.insertTransaction({
            type: TransactionType.DEBIT,
            amount,
            fromAccountId,
            toAccountId: null,
            status: TransactionStatus.APPROVED,
            description,
            transferPairId,
            cardId: null,
          });
          const creditTransaction = await uow.insertTransaction({
            type: TransactionType.CREDIT,
            amount,
            fromAccountId: null,
            toAccountId,
            status: TransactionStatus.APPROVED,
            description,
            transferPairId,
            cardId: null,
          });

          await uow.setCachedBalance(fromAccountId, sourceBalance - amount);
          await uow.setCachedBalance(toAccountId, destinationBalance + amount);

          return {
            outcome: 'approved',
            transferPairId,
            debitTransaction,
            creditTransaction,
            amount,
            fromAccountId,
            toAccountId,
          };
        });

        span.setAttribute('ledger.outcome', result.outcome);
        ledgerTransfersTotal.inc({ outcome: result.outcome });
        if (result.outcome === 'approved') {
          ledgerAmount.observe({ operation: 'transfer' }, amount);
        }

        log.info(
          {
            fromAccountId,
            toAccountId,
            amount,
            outcome: result.outcome,
            transferPairId: result.outcome === 'approved' ? result.transferPairId : undefined,
          },
          result.outcome === 'approved' ? 'Transfer completed' : 'Transfer declined'
        );

        return result;
      }
    );
  }
}
