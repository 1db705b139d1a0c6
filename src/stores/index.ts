import { LedgerStoreKind } from '../config/environments';

import { IdentityStore } from './identity.store';
import { LedgerStore } from './ledger.store';
import { MemoryIdentityStore } from './memory/memory.identity.store';
import { MemoryLedgerStore } from './memory/memory.ledger.store';
import { MongoIdentityStore } from './mongo/mongo.identity.store';
import { MongoLedgerStore } from './mongo/mongo.ledger.store';

export * from './ledger.store';
export * from './identity.store';
export { MemoryLedgerStore } from './memory/memory.ledger.store';
export type { MemoryLedgerStoreOptions } from './memory/memory.ledger.store';
export { MemoryIdentityStore } from './memory/memory.identity.store';
export { MongoLedgerStore } from './mongo/mongo.ledger.store';
export { MongoIdentityStore } from './mongo/mongo.identity.store';

export interface Stores {
  ledger: LedgerStore;
  identity: IdentityStore;
}

export interface StoreSettings {
  store: LedgerStoreKind;
  lockTimeoutMs: number;
}

/**
 * Build the store pair for the configured backend. Mongo stores expect
 * connectDatabase() to have been awaited before the first request.
 */
export const createStores = (settings: StoreSettings): Stores => {
  if (settings.store === 'memory') {
    return {
      ledger: new MemoryLedgerStore({ lockTimeoutMs: settings.lockTimeoutMs }),
      identity: new MemoryIdentityStore(),
    };
  }
  return {
    ledger: new MongoLedgerStore({ lockTimeoutMs: settings.lockTimeoutMs }),
    identity: new MongoIdentityStore(),
  };
};
