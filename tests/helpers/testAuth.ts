import request from 'supertest';
import { Application } from 'express';

import { LedgerApp } from '../../src/app';
import { UserType } from '../../src/types/identity';

export interface TestMember {
  userId: string;
  email: string;
  accountHolderId: string;
  accessToken: string;
}

let sequence = 0;

export const uniqueEmail = (prefix = 'member'): string => {
  sequence += 1;
  return `${prefix}-${sequence}@example.com`;
};

export const signupMember = async (
  app: Application,
  overrides: Partial<{ email: string; password: string; firstName: string; lastName: string }> = {}
): Promise<TestMember> => {
  const body = {
    email: uniqueEmail(),
    password: 'Password123',
    firstName: 'Test',
    lastName: 'Member',
    ...overrides,
  };

  const response = await request(app).post('/auth/signup').send(body);

  if (response.status !== 201) {
    throw new Error(`Failed to sign up test member: ${JSON.stringify(response.body)}`);
  }

  return {
    userId: response.body.data.user.userId,
    email: response.body.data.user.email,
    accountHolderId: response.body.data.accountHolderId,
    accessToken: response.body.data.tokens.accessToken,
  };
};

/**
 * Sign up a user and promote it the way the promote-admin script does
 */
export const createAdmin = async (ledgerApp: LedgerApp): Promise<TestMember> => {
  const user = await signupMember(ledgerApp.app, { email: uniqueEmail('admin') });
  await ledgerApp.container.authService.setUserType(user.email, UserType.ADMIN);
  return user;
};

export const authenticatedRequest = (app: Application, token: string) => {
  return {
    get: (url: string) => request(app).get(url).set('Authorization', `Bearer ${token}`),
    post: (url: string) => request(app).post(url).set('Authorization', `Bearer ${token}`),
    patch: (url: string) => request(app).patch(url).set('Authorization', `Bearer ${token}`),
  };
};

/**
 * Open an account over HTTP and return its id
 */
export const openAccount = async (
  app: Application,
  token: string,
  accountType = 'checking'
): Promise<string> => {
  const response = await authenticatedRequest(app, token).post('/accounts').send({ accountType });
  if (response.status !== 201) {
    throw new Error(`Failed to open test account: ${JSON.stringify(response.body)}`);
  }
  return response.body.data.account.id;
};

export const deposit = async (
  app: Application,
  token: string,
  accountId: string,
  amount: number
): Promise<void> => {
  const response = await authenticatedRequest(app, token)
    .post(`/accounts/${accountId}/transactions`)
    .send({ type: 'credit', amount });
  if (response.status !== 201) {
    throw new Error(`Failed to fund test account: ${JSON.stringify(response.body)}`);
  }
};
