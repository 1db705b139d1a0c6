import {
  AccountHolderDraft,
  AccountHolderRecord,
  AccountHolderUpdate,
  UserDraft,
  UserRecord,
  UserType,
} from '../types/identity';

export interface RegisteredUser {
  user: UserRecord;
  accountHolder: AccountHolderRecord | null;
}

/**
 * Users and their account-holder profiles
 */
export interface IdentityStore {
  /**
   * Create a user and, for members, its account holder in one step.
   * Resolves to null when the email is already registered.
   */
  registerUser(user: UserDraft, holder: AccountHolderDraft | null): Promise<RegisteredUser | null>;
  findUserById(userId: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  recordLogin(userId: string, at: Date): Promise<void>;
  setUserType(userId: string, userType: UserType): Promise<UserRecord | null>;
  findAccountHolderById(accountHolderId: string): Promise<AccountHolderRecord | null>;
  findAccountHolderByUserId(userId: string): Promise<AccountHolderRecord | null>;
  updateAccountHolder(
    accountHolderId: string,
    update: AccountHolderUpdate
  ): Promise<AccountHolderRecord | null>;
  isReady(): boolean;
}
