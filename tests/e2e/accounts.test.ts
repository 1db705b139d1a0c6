import request from 'supertest';

import {
  authenticatedRequest,
  createTestApp,
  deposit,
  openAccount,
  signupMember,
  TestMember,
} from '../helpers';

describe('Accounts API', () => {
  const { app } = createTestApp();
  let owner: TestMember;
  let stranger: TestMember;

  beforeAll(async () => {
    owner = await signupMember(app);
    stranger = await signupMember(app);
  });

  describe('POST /accounts', () => {
    it('should open an empty account with a 10-digit number', async () => {
      const response = await authenticatedRequest(app, owner.accessToken)
        .post('/accounts')
        .send({ accountType: 'savings' });

      expect(response.status).toBe(201);
      expect(response.body.data.account).toMatchObject({
        accountHolderId: owner.accountHolderId,
        accountType: 'savings',
        currency: 'USD',
        cachedBalance: 0,
        isActive: true,
      });
      expect(response.body.data.account.accountNumber).toMatch(/^\d{10}$/);
    });

    it('should default to a checking account', async () => {
      const response = await authenticatedRequest(app, owner.accessToken).post('/accounts').send({});

      expect(response.status).toBe(201);
      expect(response.body.data.account.accountType).toBe('checking');
    });

    it('should reject an unknown account type', async () => {
      const response = await authenticatedRequest(app, owner.accessToken)
        .post('/accounts')
        .send({ accountType: 'brokerage' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
    });

    it('should require authentication', async () => {
      const response = await request(app).post('/accounts').send({});

      expect(response.status).toBe(401);
    });
  });

  describe('GET /accounts', () => {
    it('should list only the caller’s accounts', async () => {
      const member = await signupMember(app);
      const first = await openAccount(app, member.accessToken);
      const second = await openAccount(app, member.accessToken, 'savings');
      await openAccount(app, stranger.accessToken);

      const response = await authenticatedRequest(app, member.accessToken).get('/accounts');

      expect(response.status).toBe(200);
      const ids: string[] = response.body.data.accounts.map((a: { id: string }) => a.id);
      expect(ids.sort()).toEqual([first, second].sort());
    });
  });

  describe('GET /accounts/:accountId', () => {
    it('should return an owned account', async () => {
      const accountId = await openAccount(app, owner.accessToken);

      const response = await authenticatedRequest(app, owner.accessToken).get(`/accounts/${accountId}`);

      expect(response.status).toBe(200);
      expect(response.body.data.account.id).toBe(accountId);
    });

    it('should forbid another holder’s account', async () => {
      const accountId = await openAccount(app, owner.accessToken);

      const response = await authenticatedRequest(app, stranger.accessToken).get(
        `/accounts/${accountId}`
      );

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(1005);
    });

    it('should report a missing account', async () => {
      const response = await authenticatedRequest(app, owner.accessToken).get('/accounts/missing-id');

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(3003);
    });
  });

  describe('GET /accounts/:accountId/balance', () => {
    it('should report matching cached and computed balances', async () => {
      const accountId = await openAccount(app, owner.accessToken);
      await deposit(app, owner.accessToken, accountId, 12345);

      const response = await authenticatedRequest(app, owner.accessToken).get(
        `/accounts/${accountId}/balance`
      );

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        accountId,
        cachedBalance: 12345,
        computedBalance: 12345,
        match: true,
        currency: 'USD',
      });
    });
  });

  describe('GET /accounts/lookup', () => {
    it('should resolve an account number without the owner or balance', async () => {
      const accountId = await openAccount(app, owner.accessToken);
      const account = await authenticatedRequest(app, owner.accessToken).get(`/accounts/${accountId}`);
      const accountNumber: string = account.body.data.account.accountNumber;

      const response = await authenticatedRequest(app, stranger.accessToken).get(
        `/accounts/lookup?accountNumber=${accountNumber}`
      );

      expect(response.status).toBe(200);
      expect(response.body.data.account).toEqual({
        id: accountId,
        accountNumber,
        accountType: 'checking',
      });
    });

    it('should reject a malformed account number', async () => {
      const response = await authenticatedRequest(app, owner.accessToken).get(
        '/accounts/lookup?accountNumber=12ab'
      );

      expect(response.status).toBe(400);
      expect(response.body.error.details.accountNumber).toEqual(['Account number must be 10 digits']);
    });
  });
});
