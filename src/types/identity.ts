export enum UserType {
  ADMIN = 'admin',
  MEMBER = 'member',
}

export interface UserRecord {
  id: string;
  email: string;
  passwordHash: string;
  userType: UserType;
  isActive: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type UserDraft = Pick<UserRecord, 'email' | 'passwordHash' | 'userType'>;

export interface AccountHolderRecord {
  id: string;
  userId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AccountHolderDraft = Pick<AccountHolderRecord, 'firstName' | 'lastName' | 'phone'>;

export type AccountHolderUpdate = Partial<AccountHolderDraft>;
