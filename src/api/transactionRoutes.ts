import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { LedgerService } from '../services/LedgerService.js';
import { mapTransaction } from './mappers.js';
import { parseTransactionFilters } from './transactionFilters.js';

const categorySchema = z.object({
  category: z.string().max(200).nullable(),
});

export function createTransactionRouter(ledgerService: LedgerService): Router {
  const router = Router();

  /**
   * GET /api/transactions - List transactions, newest first
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseTransactionFilters(req.query);
      const transactions = ledgerService.listTransactions(filters);
      res.json({ transactions: transactions.map(mapTransaction) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/transactions/export - Filtered transactions as CSV
   */
  router.get('/export', (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseTransactionFilters(req.query);
      const csv = ledgerService.exportTransactions(filters);
      res
        .status(200)
        .set({
          'Content-Type': 'text/csv; charset=utf-8',
          'Content-Disposition': 'attachment; filename="transactions.csv"',
        })
        .send(csv);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /api/transactions/:id/category - Reassign a transaction's category
   */
  router.patch('/:id/category', (req: Request, res: Response, next: NextFunction) => {
    const parsed = categorySchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid category payload', parsed.error.flatten()));
    }

    try {
      ledgerService.updateCategory(req.params.id, parsed.data.category);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/transactions - Clear all transaction data
   */
  router.delete('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      if (req.query.confirm !== 'true') {
        throw new ValidationError('Pass confirm=true to delete all transactions');
      }
      ledgerService.deleteAllTransactions();
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
