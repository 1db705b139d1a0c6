import bcrypt from 'bcryptjs';
import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { authAttemptsTotal, createServiceLogger } from '../observability';
import { IdentityStore } from '../stores';
import { UserRecord, UserType } from '../types/identity';

import { AccessToken, AuthResponse, JWTPayload, LoginDTO, PublicUser, SignupDTO } from './auth.types';

const log = createServiceLogger('auth');

const isUserType = (value: unknown): value is UserType =>
  value === UserType.ADMIN || value === UserType.MEMBER;

export const toPublicUser = (user: UserRecord): PublicUser => ({
  userId: user.id,
  email: user.email,
  userType: user.userType,
  isActive: user.isActive,
  createdAt: user.createdAt,
  lastLoginAt: user.lastLoginAt,
});

export class AuthService {
  constructor(private readonly identity: IdentityStore) {}

  generateToken(user: UserRecord): AccessToken {
    const payload: JWTPayload = {
      userId: user.id,
      email: user.email,
      userType: user.userType,
    };

    const options: SignOptions = {
      expiresIn: config.jwt.accessTokenExpiresIn as SignOptions['expiresIn'],
    };

    return {
      accessToken: jwt.sign(payload, config.jwt.secret, options),
      tokenType: 'Bearer',
      expiresIn: config.jwt.accessTokenExpiresIn,
    };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      throw ApiError.invalidToken();
    }

    if (
      typeof decoded === 'string' ||
      typeof decoded.userId !== 'string' ||
      typeof decoded.email !== 'string' ||
      !isUserType(decoded.userType)
    ) {
      throw ApiError.invalidToken('Malformed token payload');
    }

    return {
      userId: decoded.userId,
      email: decoded.email,
      userType: decoded.userType,
      iat: decoded.iat,
      exp: decoded.exp,
    };
  }

  /**
   * Sign up a member: creates the user and its account holder together
   */
  async signup(dto: SignupDTO): Promise<AuthResponse> {
    const email = dto.email.toLowerCase();
    const passwordHash = await bcrypt.hash(dto.password, config.bcrypt.rounds);

    const registered = await this.identity.registerUser(
      { email, passwordHash, userType: UserType.MEMBER },
      { firstName: dto.firstName, lastName: dto.lastName, phone: dto.phone ?? null }
    );
    if (!registered) {
      throw ApiError.emailAlreadyRegistered(email);
    }

    log.info({ userId: registered.user.id }, 'Member signed up');

    return {
      user: toPublicUser(registered.user),
      accountHolderId: registered.accountHolder?.id ?? null,
      tokens: this.generateToken(registered.user),
    };
  }

  async login(dto: LoginDTO): Promise<AuthResponse> {
    const user = await this.identity.findUserByEmail(dto.email);

    const valid =
      user !== null && user.isActive && (await bcrypt.compare(dto.password, user.passwordHash));
    if (!user || !valid) {
      authAttemptsTotal.inc({ outcome: 'failure' });
      throw ApiError.invalidCredentials();
    }

    const now = new Date();
    await this.identity.recordLogin(user.id, now);
    authAttemptsTotal.inc({ outcome: 'success' });

    const holder = await this.identity.findAccountHolderByUserId(user.id);
    return {
      user: toPublicUser({ ...user, lastLoginAt: now }),
      accountHolderId: holder?.id ?? null,
      tokens: this.generateToken(user),
    };
  }

  async getUserById(userId: string): Promise<UserRecord | null> {
    return this.identity.findUserById(userId);
  }

  async getAccountHolderId(userId: string): Promise<string | null> {
    const holder = await this.identity.findAccountHolderByUserId(userId);
    return holder?.id ?? null;
  }

  /**
   * Grant or revoke admin rights. Used by the promote-admin script.
   */
  async setUserType(email: string, userType: UserType): Promise<UserRecord> {
    const user = await this.identity.findUserByEmail(email);
    if (!user) {
      throw ApiError.notFound('user', email);
    }
    const updated = await this.identity.setUserType(user.id, userType);
    if (!updated) {
      throw ApiError.notFound('user', email);
    }
    return updated;
  }
}
