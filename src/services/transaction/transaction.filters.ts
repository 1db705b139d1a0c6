import { Request } from 'express';

import { TransactionStatus, TransactionType } from '../../types/ledger';

import { TransactionFilters } from './transaction.service';

const isStatus = (value: unknown): value is TransactionStatus =>
  Object.values(TransactionStatus).some((status) => status === value);

const isType = (value: unknown): value is TransactionType =>
  Object.values(TransactionType).some((type) => type === value);

const intOf = (value: unknown): number | undefined => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value !== '') return Number(value);
  return undefined;
};

/**
 * Filters from an already validated query string
 */
export const filtersFromQuery = (req: Request): TransactionFilters => ({
  status: isStatus(req.query.status) ? req.query.status : undefined,
  type: isType(req.query.type) ? req.query.type : undefined,
  limit: intOf(req.query.limit),
  offset: intOf(req.query.offset),
});
