import { RequestHandler } from 'express';

import { AuthController, AuthService, createAuthMiddleware } from './auth';
import { config } from './config';
import { AccountService, AccountController } from './services/account';
import { AccountHolderController, AccountHolderService } from './services/account-holder';
import { AdminController } from './services/admin';
import { CardCipher, CardController, CardService } from './services/card';
import { createLedgerEngine, LedgerEngine } from './services/ledger';
import { StatementController, StatementService } from './services/statement';
import { TransactionController, TransactionService } from './services/transaction';
import { TransferController, TransferService } from './services/transfer';
import { Stores } from './stores';

export interface ContainerOptions {
  currency?: string;
  cardEncryptionKey?: string;
  cardValidityYears?: number;
}

export interface Container {
  stores: Stores;
  ledger: LedgerEngine;
  authService: AuthService;
  accountService: AccountService;
  transactionService: TransactionService;
  transferService: TransferService;
  statementService: StatementService;
  cardService: CardService;
  accountHolderService: AccountHolderService;
  authenticate: RequestHandler;
  controllers: {
    auth: AuthController;
    account: AccountController;
    accountHolder: AccountHolderController;
    transaction: TransactionController;
    transfer: TransferController;
    statement: StatementController;
    card: CardController;
    admin: AdminController;
  };
}

/**
 * Wire every service to one pair of stores
 */
export const createContainer = (stores: Stores, options: ContainerOptions = {}): Container => {
  const ledger = createLedgerEngine(stores.ledger);

  const authService = new AuthService(stores.identity);
  const accountService = new AccountService(
    stores.ledger,
    ledger.evaluator,
    options.currency ?? config.ledger.defaultCurrency
  );
  const transactionService = new TransactionService(stores.ledger, ledger.authorizer, accountService);
  const transferService = new TransferService(ledger.coordinator, accountService);
  const statementService = new StatementService(ledger.statements, accountService);
  const cardService = new CardService(
    stores.ledger,
    accountService,
    new CardCipher(options.cardEncryptionKey ?? config.card.encryptionKey),
    { validityYears: options.cardValidityYears ?? config.card.validityYears }
  );
  const accountHolderService = new AccountHolderService(stores.identity);

  return {
    stores,
    ledger,
    authService,
    accountService,
    transactionService,
    transferService,
    statementService,
    cardService,
    accountHolderService,
    authenticate: createAuthMiddleware(authService),
    controllers: {
      auth: new AuthController(authService),
      account: new AccountController(accountService),
      accountHolder: new AccountHolderController(accountHolderService),
      transaction: new TransactionController(transactionService),
      transfer: new TransferController(transferService),
      statement: new StatementController(statementService),
      card: new CardController(cardService),
      admin: new AdminController(accountService, transactionService),
    },
  };
};
