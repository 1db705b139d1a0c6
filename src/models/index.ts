export { User } from './User';
export type { IUser } from './User';
export { AccountHolder } from './AccountHolder';
export type { IAccountHolder } from './AccountHolder';
export { Account } from './Account';
export type { IAccount } from './Account';
export { Transaction } from './Transaction';
export type { ITransaction } from './Transaction';
export { Card } from './Card';
export type { ICard } from './Card';
