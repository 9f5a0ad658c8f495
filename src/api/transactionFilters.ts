import { z } from 'zod';
import type { TransactionFilters } from '../domain/entities/Transaction.js';
import { ValidationError } from '../domain/errors.js';

const filterQuerySchema = z.object({
  accountId: z.string().min(1).optional(),
  from: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  to: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  category: z.string().optional(),
});

/**
 * ?accountId=&from=&to=&category= → TransactionFilters
 */
export function parseTransactionFilters(query: unknown): TransactionFilters {
  const parsed = filterQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError('Invalid transaction filters', parsed.error.flatten());
  }

  const { accountId, from, to, category } = parsed.data;
  const filters: TransactionFilters = {};
  if (accountId) filters.accountId = accountId;
  if (from || to) filters.dateRange = { from, to };
  if (category !== undefined) filters.category = category;
  return filters;
}
