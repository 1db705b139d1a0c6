import { Request } from 'express';

import { UserType } from '../types/identity';

export interface JWTPayload {
  userId: string;
  email: string;
  userType: UserType;
  iat?: number;
  exp?: number;
}

/**
 * Identity attached to the request by the auth middleware
 */
export interface AuthenticatedUser {
  id: string;
  email: string;
  userType: UserType;
  /** Null for admins, who hold no accounts */
  accountHolderId: string | null;
}

export interface AuthRequest extends Request {
  user?: AuthenticatedUser;
}

/**
 * Request already passed through requireMember
 */
export interface MemberRequest extends Request {
  user?: AuthenticatedUser;
  accountHolderId?: string;
}

export interface SignupDTO {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  phone?: string | null;
}

export interface LoginDTO {
  email: string;
  password: string;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: string;
}

export interface PublicUser {
  userId: string;
  email: string;
  userType: UserType;
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface AuthResponse {
  user: PublicUser;
  accountHolderId: string | null;
  tokens: AccessToken;
}
