import { ErrorCode } from '../../../src/types/errors';
import { TransactionStatus, TransactionType } from '../../../src/types/ledger';
import { createLedgerFixture } from '../../helpers';

describe('TransferCoordinator', () => {
  it('should move money between two accounts', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(5000);
    const b = await account(1000);

    const result = await engine.coordinator.transfer({
      fromAccountId: a.id,
      toAccountId: b.id,
      amount: 2500,
      description: 'Rent share',
    });

    if (result.outcome !== 'approved') {
      throw new Error('expected an approved transfer');
    }
    expect(result.amount).toBe(2500);
    expect(result.debitTransaction).toMatchObject({
      type: TransactionType.DEBIT,
      amount: 2500,
      fromAccountId: a.id,
      toAccountId: null,
      status: TransactionStatus.APPROVED,
      description: 'Rent share',
      transferPairId: result.transferPairId,
    });
    expect(result.creditTransaction).toMatchObject({
      type: TransactionType.CREDIT,
      amount: 2500,
      fromAccountId: null,
      toAccountId: b.id,
      status: TransactionStatus.APPROVED,
      transferPairId: result.transferPairId,
    });

    expect(await engine.evaluator.computeBalance(a.id)).toBe(2500);
    expect(await engine.evaluator.computeBalance(b.id)).toBe(3500);
    expect((await store.findAccount(a.id))?.cachedBalance).toBe(2500);
    expect((await store.findAccount(b.id))?.cachedBalance).toBe(3500);
  });

  it('should write exactly two rows sharing the pair id', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(5000);
    const b = await account();

    const result = await engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 100 });
    if (result.outcome !== 'approved') {
      throw new Error('expected an approved transfer');
    }

    const pair = await store.listTransactions({ transferPairId: result.transferPairId });
    expect(pair.map((r) => r.type)).toEqual([TransactionType.DEBIT, TransactionType.CREDIT]);
  });

  it('should decline with a single declined debit on the source', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(1000);
    const b = await account(1000);

    const result = await engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 1001 });

    if (result.outcome !== 'declined') {
      throw new Error('expected a declined transfer');
    }
    expect(result.reason).toBe('insufficient_funds');
    expect(result.debitTransaction).toMatchObject({
      type: TransactionType.DEBIT,
      amount: 1001,
      fromAccountId: a.id,
      toAccountId: null,
      status: TransactionStatus.DECLINED,
      transferPairId: null,
    });

    expect(await store.listTransactions({ accountId: b.id })).toHaveLength(1);
    expect(await engine.evaluator.computeBalance(a.id)).toBe(1000);
    expect(await engine.evaluator.computeBalance(b.id)).toBe(1000);
  });

  it('should allow the full balance to be moved', async () => {
    const { engine, account } = createLedgerFixture();
    const a = await account(750);
    const b = await account();

    const result = await engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 750 });

    expect(result.outcome).toBe('approved');
    expect(await engine.evaluator.computeBalance(a.id)).toBe(0);
  });

  it('should reject a transfer to the same account', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(1000);

    await expect(
      engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: a.id, amount: 10 })
    ).rejects.toMatchObject({ errorCode: ErrorCode.SAME_ACCOUNT_TRANSFER, statusCode: 400 });

    expect(await store.listTransactions({ accountId: a.id })).toHaveLength(1);
  });

  it('should reject a non-positive amount', async () => {
    const { engine, account } = createLedgerFixture();
    const a = await account(1000);
    const b = await account();

    await expect(
      engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 0 })
    ).rejects.toMatchObject({ errorCode: ErrorCode.INVALID_AMOUNT });
  });

  it('should reject a transfer that would push the destination past the largest balance', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(1000);
    const b = await account(Number.MAX_SAFE_INTEGER);

    await expect(
      engine.coordinator.transfer({ fromAccountId: a.id, toAccountId: b.id, amount: 10 })
    ).rejects.toMatchObject({ errorCode: ErrorCode.INVALID_AMOUNT, statusCode: 400 });

    expect(await store.listTransactions({ accountId: a.id })).toHaveLength(1);
    expect(await store.listTransactions({ accountId: b.id })).toHaveLength(1);
    expect(await engine.evaluator.computeBalance(a.id)).toBe(1000);
    expect((await store.findAccount(b.id))?.cachedBalance).toBe(Number.MAX_SAFE_INTEGER);
  });

  it.each([
    ['source', true],
    ['destination', false],
  ])('should reject a missing %s account and write nothing', async (_label, sourceMissing) => {
    const { store, engine, account } = createLedgerFixture();
    const existing = await account(1000);

    const request = sourceMissing
      ? { fromAccountId: 'missing', toAccountId: existing.id, amount: 10 }
      : { fromAccountId: existing.id, toAccountId: 'missing', amount: 10 };

    await expect(engine.coordinator.transfer(request)).rejects.toMatchObject({
      errorCode: ErrorCode.ACCOUNT_NOT_FOUND,
    });
    expect(await store.listTransactions({ accountId: existing.id })).toHaveLength(1);
  });

  it('should refuse a source account owned by someone else', async () => {
    const { store, engine, account } = createLedgerFixture();
    const a = await account(1000, { accountHolderId: 'holder-a' });
    const b = await account(0, { accountHolderId: 'holder-b' });

    await expect(
      engine.coordinator.transfer({
        fromAccountId: a.id,
        toAccountId: b.id,
        amount: 10,
        expectedSourceHolderId: 'holder-b',
      })
    ).rejects.toMatchObject({ errorCode: ErrorCode.FORBIDDEN, statusCode: 403 });

    expect(await store.listTransactions({ accountId: b.id })).toEqual([]);
    expect(await engine.evaluator.computeBalance(a.id)).toBe(1000);
  });
});
