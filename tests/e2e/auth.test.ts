import request from 'supertest';

import { authenticatedRequest, createTestApp, signupMember, uniqueEmail } from '../helpers';

describe('Auth API', () => {
  const { app } = createTestApp();

  describe('POST /auth/signup', () => {
    it('should register a member with an account holder and a token', async () => {
      const email = uniqueEmail('signup');

      const response = await request(app).post('/auth/signup').send({
        email,
        password: 'Password123',
        firstName: 'Ada',
        lastName: 'Byron',
        phone: '555-0100',
      });

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data.user).toMatchObject({ email, userType: 'member', isActive: true });
      expect(response.body.data.user).not.toHaveProperty('passwordHash');
      expect(typeof response.body.data.accountHolderId).toBe('string');
      expect(typeof response.body.data.tokens.accessToken).toBe('string');
    });

    it('should refuse an email that is already registered', async () => {
      const member = await signupMember(app);

      const response = await request(app).post('/auth/signup').send({
        email: member.email,
        password: 'Password123',
        firstName: 'Again',
        lastName: 'Member',
      });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(3008);
    });

    it('should reject a short password with field details', async () => {
      const response = await request(app).post('/auth/signup').send({
        email: uniqueEmail('short'),
        password: 'short',
        firstName: 'Test',
        lastName: 'Member',
      });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
      expect(response.body.error.details.password).toEqual([
        'Password must be between 8 and 128 characters',
      ]);
    });
  });

  describe('POST /auth/login', () => {
    it('should issue a token for valid credentials', async () => {
      const member = await signupMember(app);

      const response = await request(app)
        .post('/auth/login')
        .send({ email: member.email, password: 'Password123' });

      expect(response.status).toBe(200);
      expect(response.body.data.user.userId).toBe(member.userId);
      expect(response.body.data.accountHolderId).toBe(member.accountHolderId);
      expect(typeof response.body.data.tokens.accessToken).toBe('string');
    });

    it('should reject a wrong password', async () => {
      const member = await signupMember(app);

      const response = await request(app)
        .post('/auth/login')
        .send({ email: member.email, password: 'WrongPassword1' });

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1004);
    });

    it('should reject an unknown email the same way', async () => {
      const response = await request(app)
        .post('/auth/login')
        .send({ email: uniqueEmail('nobody'), password: 'Password123' });

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1004);
    });
  });

  describe('GET /auth/me', () => {
    it('should return the current user', async () => {
      const member = await signupMember(app);

      const response = await authenticatedRequest(app, member.accessToken).get('/auth/me');

      expect(response.status).toBe(200);
      expect(response.body.data.user.userId).toBe(member.userId);
      expect(response.body.data.accountHolderId).toBe(member.accountHolderId);
    });

    it('should require a token', async () => {
      const response = await request(app).get('/auth/me');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1001);
    });

    it('should reject a malformed token', async () => {
      const response = await authenticatedRequest(app, 'not-a-token').get('/auth/me');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1002);
    });
  });
});
