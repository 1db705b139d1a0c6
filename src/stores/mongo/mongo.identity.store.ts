import mongoose from 'mongoose';
import { v4 as uuid } from 'uuid';

import { AccountHolder, IAccountHolder, IUser, User } from '../../models';
import {
  AccountHolderDraft,
  AccountHolderRecord,
  AccountHolderUpdate,
  UserDraft,
  UserRecord,
  UserType,
} from '../../types/identity';
import { IdentityStore, RegisteredUser } from '../identity.store';

const toUser = (doc: IUser): UserRecord => ({
  id: doc.userId,
  email: doc.email,
  passwordHash: doc.passwordHash,
  userType: doc.userType,
  isActive: doc.isActive,
  lastLoginAt: doc.lastLoginAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toAccountHolder = (doc: IAccountHolder): AccountHolderRecord => ({
  id: doc.accountHolderId,
  userId: doc.userId,
  firstName: doc.firstName,
  lastName: doc.lastName,
  email: doc.email,
  phone: doc.phone ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const isDuplicateKey = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

export class MongoIdentityStore implements IdentityStore {
  async registerUser(
    draft: UserDraft,
    holderDraft: AccountHolderDraft | null
  ): Promise<RegisteredUser | null> {
    const session = await mongoose.startSession();
    try {
      let registered: RegisteredUser | null = null;
      await session.withTransaction(async () => {
        const user = new User({ ...draft, userId: uuid() });
        await user.save({ session });

        let accountHolder: AccountHolderRecord | null = null;
        if (holderDraft) {
          const holder = new AccountHolder({
            accountHolderId: uuid(),
            userId: user.userId,
            email: user.email,
            firstName: holderDraft.firstName,
            lastName: holderDraft.lastName,
            phone: holderDraft.phone ?? undefined,
          });
          await holder.save({ session });
          accountHolder = toAccountHolder(holder);
        }
        registered = { user: toUser(user), accountHolder };
      });
      return registered;
    } catch (err) {
      if (isDuplicateKey(err)) {
        return null;
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

  async findUserById(userId: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ userId });
    return doc ? toUser(doc) : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email: email.toLowerCase() });
    return doc ? toUser(doc) : null;
  }

  async recordLogin(userId: string, at: Date): Promise<void> {
    await User.updateOne({ userId }, { $set: { lastLoginAt: at } });
  }

  async setUserType(userId: string, userType: UserType): Promise<UserRecord | null> {
    const doc = await User.findOneAndUpdate({ userId }, { $set: { userType } }, { new: true });
    return doc ? toUser(doc) : null;
  }

  async findAccountHolderById(accountHolderId: string): Promise<AccountHolderRecord | null> {
    const doc = await AccountHolder.findOne({ accountHolderId });
    return doc ? toAccountHolder(doc) : null;
  }

  async findAccountHolderByUserId(userId: string): Promise<AccountHolderRecord | null> {
    const doc = await AccountHolder.findOne({ userId });
    return doc ? toAccountHolder(doc) : null;
  }

  async updateAccountHolder(
    accountHolderId: string,
    update: AccountHolderUpdate
  ): Promise<AccountHolderRecord | null> {
    const $set: Record<string, string> = {};
    const $unset: Record<string, 1> = {};
    if (update.firstName !== undefined) $set.firstName = update.firstName;
    if (update.lastName !== undefined) $set.lastName = update.lastName;
    if (update.phone === null) {
      $unset.phone = 1;
    } else if (update.phone !== undefined) {
      $set.phone = update.phone;
    }

    const doc = await AccountHolder.findOneAndUpdate(
      { accountHolderId },
      { $set, $unset },
      { new: true, runValidators: true }
    );
    return doc ? toAccountHolder(doc) : null;
  }

  isReady(): boolean {
    return mongoose.connection.readyState === 1;
  }
}
