import { v4 as uuid } from 'uuid';

import {
  AccountHolderDraft,
  AccountHolderRecord,
  AccountHolderUpdate,
  UserDraft,
  UserRecord,
  UserType,
} from '../../types/identity';
import { IdentityStore, RegisteredUser } from '../identity.store';

export interface MemoryIdentityStoreOptions {
  clock?: () => Date;
}

export class MemoryIdentityStore implements IdentityStore {
  private readonly users = new Map<string, UserRecord>();
  private readonly holders = new Map<string, AccountHolderRecord>();
  private readonly clock: () => Date;

  constructor(options: MemoryIdentityStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async registerUser(
    draft: UserDraft,
    holderDraft: AccountHolderDraft | null
  ): Promise<RegisteredUser | null> {
    const email = draft.email.toLowerCase();
    if (await this.findUserByEmail(email)) {
      return null;
    }

    const now = this.clock();
    const user: UserRecord = {
      ...draft,
      email,
      id: uuid(),
      isActive: true,
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);

    let accountHolder: AccountHolderRecord | null = null;
    if (holderDraft) {
      accountHolder = {
        ...holderDraft,
        id: uuid(),
        userId: user.id,
        email,
        createdAt: now,
        updatedAt: now,
      };
      this.holders.set(accountHolder.id, accountHolder);
    }

    return { user: { ...user }, accountHolder: accountHolder ? { ...accountHolder } : null };
  }

  async findUserById(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const normalized = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === normalized) {
        return { ...user };
      }
    }
    return null;
  }

  async recordLogin(userId: string, at: Date): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      this.users.set(userId, { ...user, lastLoginAt: at, updatedAt: at });
    }
  }

  async setUserType(userId: string, userType: UserType): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    if (!user) {
      return null;
    }
    const updated = { ...user, userType, updatedAt: this.clock() };
    this.users.set(userId, updated);
    return { ...updated };
  }

  async findAccountHolderById(accountHolderId: string): Promise<AccountHolderRecord | null> {
    const holder = this.holders.get(accountHolderId);
    return holder ? { ...holder } : null;
  }

  async findAccountHolderByUserId(userId: string): Promise<AccountHolderRecord | null> {
    for (const holder of this.holders.values()) {
      if (holder.userId === userId) {
        return { ...holder };
      }
    }
    return null;
  }

  async updateAccountHolder(
    accountHolderId: string,
    update: AccountHolderUpdate
  ): Promise<AccountHolderRecord | null> {
    const holder = this.holders.get(accountHolderId);
    if (!holder) {
      return null;
    }
    const updated: AccountHolderRecord = {
      ...holder,
      firstName: update.firstName ?? holder.firstName,
      lastName: update.lastName ?? holder.lastName,
      phone: update.phone === undefined ? holder.phone : update.phone,
      updatedAt: this.clock(),
    };
    this.holders.set(accountHolderId, updated);
    return { ...updated };
  }

  isReady(): boolean {
    return true;
  }
}
