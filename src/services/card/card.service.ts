import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { LedgerStore } from '../../stores';
import { CardRecord } from '../../types/ledger';
import { AccountService } from '../account/account.service';

import { CardCipher, generateCardNumber, generateCvv } from './card.crypto';

const log = createServiceLogger('card');

/** What leaves the API: never the number or the CVV */
export interface MaskedCard {
  id: string;
  accountId: string;
  cardNumberLastFour: string;
  expirationMonth: number;
  expirationYear: number;
  isActive: boolean;
  createdAt: Date;
}

export const maskCard = (card: CardRecord): MaskedCard => ({
  id: card.id,
  accountId: card.accountId,
  cardNumberLastFour: card.cardNumberLastFour,
  expirationMonth: card.expirationMonth,
  expirationYear: card.expirationYear,
  isActive: card.isActive,
  createdAt: card.createdAt,
});

export interface CardServiceOptions {
  validityYears: number;
  clock?: () => Date;
}

export class CardService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: LedgerStore,
    private readonly accountService: AccountService,
    private readonly cipher: CardCipher,
    private readonly options: CardServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Issue the account's only card. The account lock serializes two concurrent
   * issues for the same account.
   */
  async issue(accountHolderId: string, accountId: string): Promise<MaskedCard> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);

    const cardNumber = generateCardNumber();
    const now = this.clock();

    const card = await this.store.runUnitOfWork(async (uow) => {
      const account = await uow.lockAccount(accountId);
      if (!account) {
        throw ApiError.notFound('account', accountId);
      }
      if (await uow.findCardByAccount(accountId)) {
        throw ApiError.duplicateCard(accountId);
      }
      return uow.insertCard({
        accountId,
        cardNumberEncrypted: this.cipher.encrypt(cardNumber),
        cardNumberLastFour: cardNumber.slice(-4),
        expirationMonth: now.getUTCMonth() + 1,
        expirationYear: now.getUTCFullYear() + this.options.validityYears,
        cvvEncrypted: this.cipher.encrypt(generateCvv()),
      });
    });

    log.info({ accountId, cardId: card.id }, 'Card issued');
    return maskCard(card);
  }

  async get(accountHolderId: string, accountId: string): Promise<MaskedCard> {
    await this.accountService.getOwnedAccount(accountId, accountHolderId);
    const card = await this.store.findCardByAccount(accountId);
    if (!card) {
      throw ApiError.notFound('card');
    }
    return maskCard(card);
  }
}
