/**
 * Ledger concurrency and atomicity
 *
 * Many units of work interleave on the in-memory store; every assertion is on
 * conserved totals and on cached balances matching the log afterwards.
 */
import { LockTimeoutError } from '../../../src/middlewares/errorHandler';
import { createLedgerEngine } from '../../../src/services/ledger';
import { MemoryLedgerStore } from '../../../src/stores';
import { TransactionStatus, TransactionType } from '../../../src/types/ledger';
import { createLedgerFixture, FaultyLedgerStore, insertAccount } from '../../helpers';

describe('Ledger concurrency', () => {
  it('should never overdraw under concurrent debits', async () => {
    const { engine, account } = createLedgerFixture();
    const acct = await account(1000);

    const results = await Promise.all(
      Array.from({ length: 20 }, () =>
        engine.authorizer.authorize({ accountId: acct.id, type: TransactionType.DEBIT, amount: 100 })
      )
    );

    expect(results.filter((r) => r.outcome === 'approved')).toHaveLength(10);
    expect(results.filter((r) => r.outcome === 'declined')).toHaveLength(10);
    expect(await engine.evaluator.computeBalance(acct.id)).toBe(0);
    expect((await engine.evaluator.checkIntegrity(acct.id)).match).toBe(true);
  });

  it('should complete opposing transfers without deadlock and conserve money', async () => {
    const { engine, account } = createLedgerFixture({ lockTimeoutMs: 2000 });
    const a = await account(10000);
    const b = await account(10000);

    const transfers = Array.from({ length: 40 }, (_, i) =>
      i % 2 === 0
        ? engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 100 })
        : engine.coordinator.transfer({ fromAccountId: b.id, toAccountId: a.id, amount: 100 })
    );
    const results = await Promise.all(transfers);

    expect(results.every((r) => r.outcome === 'approved')).toBe(true);
    expect(await engine.evaluator.computeBalance(a.id)).toBe(10000);
    expect(await engine.evaluator.computeBalance(b.id)).toBe(10000);
    expect((await engine.evaluator.checkIntegrity(a.id)).match).toBe(true);
    expect((await engine.evaluator.checkIntegrity(b.id)).match).toBe(true);
  });

  it('should keep the total constant across a ring of concurrent transfers', async () => {
    const { engine, account } = createLedgerFixture({ lockTimeoutMs: 2000 });
    const accounts = await Promise.all([account(3000), account(3000), account(3000)]);

    await Promise.all(
      Array.from({ length: 30 }, (_, i) => {
        const from = accounts[i % 3];
        const to = accounts[(i + 1) % 3];
        return engine.coordinator.transfer({ fromAccountId: from.id, toAccountId: to.id, amount: 250 });
      })
    );

    const balances = await Promise.all(accounts.map((a) => engine.evaluator.computeBalance(a.id)));
    expect(balances.reduce((sum, balance) => sum + balance, 0)).toBe(9000);
    for (const acct of accounts) {
      expect((await engine.evaluator.checkIntegrity(acct.id)).match).toBe(true);
    }
  });

  it('should pair every approved transfer debit with exactly one credit', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(1000);
    const b = await account(0);

    await Promise.all(
      Array.from({ length: 15 }, () =>
        engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 100 })
      )
    );

    const approvedDebits = await store.listTransactions({
      accountId: a.id,
      type: TransactionType.DEBIT,
      status: TransactionStatus.APPROVED,
    });
    const declined = await store.listTransactions({ accountId: a.id, status: TransactionStatus.DECLINED });

    expect(approvedDebits).toHaveLength(10);
    expect(declined).toHaveLength(5);
    expect(declined.every((row) => row.transferPairId === null)).toBe(true);

    for (const debit of approvedDebits) {
      if (!debit.transferPairId) {
        throw new Error('approved transfer debit without a pair id');
      }
      const pair = await store.listTransactions({ transferPairId: debit.transferPairId });
      expect(pair).toHaveLength(2);
      const creditLeg = pair.find((row) => row.type === TransactionType.CREDIT);
      expect(creditLeg).toMatchObject({ toAccountId: b.id, amount: debit.amount });
    }
  });
});

describe('Ledger atomicity', () => {
  it('should leave no trace of a transfer that fails between its legs', async () => {
    const faulty = new FaultyLedgerStore(new MemoryLedgerStore({ lockTimeoutMs: 100 }));
    const engine = createLedgerEngine(faulty);
    const a = await insertAccount(faulty);
    const b = await insertAccount(faulty);
    await engine.authorizer.authorize({ accountId: a.id, type: TransactionType.CREDIT, amount: 5000 });

    faulty.failOnInsert = 2;
    await expect(
      engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 2500 })
    ).rejects.toThrow('Injected failure on insert 2');
    faulty.failOnInsert = null;

    expect(await faulty.listTransactions({ accountId: a.id })).toHaveLength(1);
    expect(await faulty.listTransactions({ accountId: b.id })).toEqual([]);
    expect((await faulty.findAccount(a.id))?.cachedBalance).toBe(5000);
    expect((await faulty.findAccount(b.id))?.cachedBalance).toBe(0);

    // Both locks were released
    const retry = await engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 2500 });
    expect(retry.outcome).toBe('approved');
    expect(await engine.evaluator.computeBalance(a.id)).toBe(2500);
    expect(await engine.evaluator.computeBalance(b.id)).toBe(2500);
  });

  it('should roll back an authorization that fails while writing its row', async () => {
    const faulty = new FaultyLedgerStore(new MemoryLedgerStore());
    const engine = createLedgerEngine(faulty);
    const acct = await insertAccount(faulty);

    faulty.failOnInsert = 1;
    await expect(
      engine.authorizer.authorize({ accountId: acct.id, type: TransactionType.CREDIT, amount: 100 })
    ).rejects.toThrow('Injected failure on insert 1');

    expect(await faulty.listTransactions({ accountId: acct.id })).toEqual([]);
    expect((await faulty.findAccount(acct.id))?.cachedBalance).toBe(0);
  });
});

describe('Lock timeouts', () => {
  it('should fail a unit that cannot get its lock in time, and apply nothing', async () => {
    const store = new MemoryLedgerStore({ lockTimeoutMs: 50 });
    const engine = createLedgerEngine(store);
    const acct = await insertAccount(store);

    let releaseHolder: () => void = () => undefined;
    const holderReleased = new Promise<void>((resolve) => {
      releaseHolder = resolve;
    });
    let holderLocked: () => void = () => undefined;
    const lockTaken = new Promise<void>((resolve) => {
      holderLocked = resolve;
    });

    const holder = store.runUnitOfWork(async (uow) => {
      await uow.lockAccount(acct.id);
      holderLocked();
      await holderReleased;
    });
    await lockTaken;

    const blocked = engine.authorizer.authorize({
      accountId: acct.id,
      type: TransactionType.CREDIT,
      amount: 100,
    });

    await expect(blocked).rejects.toBeInstanceOf(LockTimeoutError);
    expect(await store.listTransactions({ accountId: acct.id })).toEqual([]);

    releaseHolder();
    await holder;

    const after = await engine.authorizer.authorize({
      accountId: acct.id,
      type: TransactionType.CREDIT,
      amount: 100,
    });
    expect(after.outcome).toBe('approved');
  });
});
