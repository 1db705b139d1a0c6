import { ApiError } from '../../../src/middlewares/errorHandler';
import { MemoryLedgerStore } from '../../../src/stores';
import { ErrorCode } from '../../../src/types/errors';
import {
  AccountType,
  TransactionDraft,
  TransactionStatus,
  TransactionType,
} from '../../../src/types/ledger';
import { insertAccount } from '../../helpers';

const credit = (accountId: string, amount: number, description: string | null = null): TransactionDraft => ({
  type: TransactionType.CREDIT,
  amount,
  fromAccountId: null,
  toAccountId: accountId,
  status: TransactionStatus.APPROVED,
  description,
  transferPairId: null,
  cardId: null,
});

describe('MemoryLedgerStore', () => {
  describe('accounts', () => {
    it('should open accounts with a zero cached balance', async () => {
      const store = new MemoryLedgerStore();

      const account = await insertAccount(store, { accountNumber: '1234567890' });

      expect(account).toMatchObject({
        accountHolderId: 'holder-1',
        accountType: AccountType.CHECKING,
        accountNumber: '1234567890',
        currency: 'USD',
        isActive: true,
        cachedBalance: 0,
      });
      expect(await store.findAccountByNumber('1234567890')).toEqual(account);
    });

    it('should reject a duplicate account number', async () => {
      const store = new MemoryLedgerStore();
      await insertAccount(store, { accountNumber: '1111111111' });

      await expect(insertAccount(store, { accountNumber: '1111111111' })).rejects.toMatchObject({
        errorCode: ErrorCode.DUPLICATE_ACCOUNT_NUMBER,
        statusCode: 409,
        message: 'Account number 1111111111 is taken',
      });
    });

    it('should filter accounts by holder', async () => {
      const store = new MemoryLedgerStore();
      const mine = await insertAccount(store, { accountHolderId: 'holder-a' });
      await insertAccount(store, { accountHolderId: 'holder-b' });

      const accounts = await store.listAccounts({ accountHolderId: 'holder-a' });

      expect(accounts.map((a) => a.id)).toEqual([mine.id]);
      expect(await store.listAccounts()).toHaveLength(2);
    });

    it('should hand out copies', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      const copy = await store.findAccount(account.id);
      if (!copy) {
        throw new Error('account missing');
      }
      copy.cachedBalance = 999;

      expect((await store.findAccount(account.id))?.cachedBalance).toBe(0);
    });
  });

  describe('units of work', () => {
    it('should commit every write when the work resolves', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      await store.runUnitOfWork(async (uow) => {
        await uow.lockAccount(account.id);
        await uow.insertTransaction(credit(account.id, 500));
        await uow.setCachedBalance(account.id, 500);
      });

      expect(await store.listTransactions({ accountId: account.id })).toHaveLength(1);
      expect((await store.findAccount(account.id))?.cachedBalance).toBe(500);
    });

    it('should roll back every write when the work rejects', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      await expect(
        store.runUnitOfWork(async (uow) => {
          await uow.lockAccount(account.id);
          await uow.insertTransaction(credit(account.id, 500));
          await uow.setCachedBalance(account.id, 500);
          await uow.insertAccount({
            accountHolderId: 'holder-1',
            accountType: AccountType.SAVINGS,
            accountNumber: '9999999999',
            currency: 'USD',
          });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await store.listTransactions({ accountId: account.id })).toEqual([]);
      expect((await store.findAccount(account.id))?.cachedBalance).toBe(0);
      expect(await store.findAccountByNumber('9999999999')).toBeNull();
    });

    it('should show staged writes inside the unit only', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      await store.runUnitOfWork(async (uow) => {
        await uow.insertTransaction(credit(account.id, 100));

        expect(await uow.listTransactions({ accountId: account.id })).toHaveLength(1);
        expect(await store.listTransactions({ accountId: account.id })).toHaveLength(0);
      });

      expect(await store.listTransactions({ accountId: account.id })).toHaveLength(1);
    });

    it('should return null when locking a missing account', async () => {
      const store = new MemoryLedgerStore();

      const locked = await store.runUnitOfWork((uow) => uow.lockAccount('missing'));

      expect(locked).toBeNull();
    });

    it('should release locks after a failed unit', async () => {
      const store = new MemoryLedgerStore({ lockTimeoutMs: 50 });
      const account = await insertAccount(store);

      await expect(
        store.runUnitOfWork(async (uow) => {
          await uow.lockAccount(account.id);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      const relocked = await store.runUnitOfWork((uow) => uow.lockAccount(account.id));
      expect(relocked?.id).toBe(account.id);
    });
  });

  describe('constraints', () => {
    it('should refuse a cached balance written without the account lock', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      const write = store.runUnitOfWork((uow) => uow.setCachedBalance(account.id, 10));

      await expect(write).rejects.toThrow(
        `Constraint violation: cached balance of ${account.id} written without its lock`
      );
      await expect(write).rejects.toMatchObject({
        errorCode: ErrorCode.INTERNAL_ERROR,
        isOperational: false,
      });
    });

    it('should refuse a negative cached balance', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      await expect(
        store.runUnitOfWork(async (uow) => {
          await uow.lockAccount(account.id);
          await uow.setCachedBalance(account.id, -1);
        })
      ).rejects.toThrow('Constraint violation: cached balance must be a non-negative integer, got -1');
    });

    it('should refuse a non-positive transaction amount', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);

      await expect(
        store.runUnitOfWork((uow) => uow.insertTransaction(credit(account.id, 0)))
      ).rejects.toThrow('Constraint violation: transaction amount must be a positive integer, got 0');
    });

    it('should allow one card per account', async () => {
      const store = new MemoryLedgerStore();
      const account = await insertAccount(store);
      const draft = {
        accountId: account.id,
        cardNumberEncrypted: 'enc-number',
        cardNumberLastFour: '4242',
        expirationMonth: 1,
        expirationYear: 2030,
        cvvEncrypted: 'enc-cvv',
      };

      const card = await store.runUnitOfWork((uow) => uow.insertCard(draft));
      const second = store.runUnitOfWork((uow) => uow.insertCard(draft));

      await expect(second).rejects.toBeInstanceOf(ApiError);
      await expect(second).rejects.toMatchObject({ errorCode: ErrorCode.DUPLICATE_CARD });
      expect(card.isActive).toBe(true);
      expect(await store.findCardByAccount(account.id)).toEqual(card);
      expect(await store.findCard(card.id)).toEqual(card);
    });
  });

  describe('listTransactions', () => {
    const at = (iso: string) => new Date(iso);

    const seed = async () => {
      let now = at('2024-05-01T10:00:00Z');
      let id = 0;
      const store = new MemoryLedgerStore({
        clock: () => now,
        generateId: () => `id-${++id}`,
      });
      const account = await insertAccount(store);

      const insert = (when: string, description: string, status = TransactionStatus.APPROVED) => {
        now = at(when);
        return store.runUnitOfWork((uow) =>
          uow.insertTransaction({ ...credit(account.id, 100, description), status })
        );
      };

      await insert('2024-05-02T00:00:00Z', 'second');
      await insert('2024-05-01T12:00:00Z', 'first');
      await insert('2024-05-02T00:00:00Z', 'third');
      await insert('2024-05-03T00:00:00Z', 'fourth', TransactionStatus.DECLINED);

      return { store, account };
    };

    it('should order by creation time and break ties by insertion order', async () => {
      const { store, account } = await seed();

      const rows = await store.listTransactions({ accountId: account.id });

      expect(rows.map((r) => r.description)).toEqual(['first', 'second', 'third', 'fourth']);
    });

    it('should reverse the order for desc', async () => {
      const { store, account } = await seed();

      const rows = await store.listTransactions({ accountId: account.id, order: 'desc' });

      expect(rows.map((r) => r.description)).toEqual(['fourth', 'third', 'second', 'first']);
    });

    it('should page with offset and limit', async () => {
      const { store, account } = await seed();

      const rows = await store.listTransactions({ accountId: account.id, offset: 1, limit: 2 });

      expect(rows.map((r) => r.description)).toEqual(['second', 'third']);
    });

    it('should filter by status and by a half-open time window', async () => {
      const { store, account } = await seed();

      const declined = await store.listTransactions({
        accountId: account.id,
        status: TransactionStatus.DECLINED,
      });
      const window = await store.listTransactions({
        accountId: account.id,
        createdFrom: at('2024-05-02T00:00:00Z'),
        createdBefore: at('2024-05-03T00:00:00Z'),
      });

      expect(declined.map((r) => r.description)).toEqual(['fourth']);
      expect(window.map((r) => r.description)).toEqual(['second', 'third']);
    });

    it('should find a row by id', async () => {
      const { store } = await seed();

      const row = await store.findTransaction('id-3');

      expect(row?.description).toBe('first');
      expect(await store.findTransaction('id-404')).toBeNull();
    });
  });
});
