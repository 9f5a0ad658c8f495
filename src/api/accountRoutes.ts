import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { LedgerService } from '../services/LedgerService.js';
import { mapAccount } from './mappers.js';

const createAccountSchema = z.object({
  name: z.string().trim().min(1),
  institutionId: z.string().trim().min(1),
});

const updateAccountSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    institutionId: z.string().trim().min(1).optional(),
  })
  .refine((value) => value.name !== undefined || value.institutionId !== undefined, {
    message: 'Provide name or institutionId',
  });

export function createAccountRouter(ledgerService: LedgerService): Router {
  const router = Router();

  /**
   * GET /api/accounts
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ accounts: ledgerService.listAccounts().map(mapAccount) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/accounts/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ account: mapAccount(ledgerService.getAccount(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/accounts
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    const parsed = createAccountSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid account payload', parsed.error.flatten()));
    }

    try {
      const account = ledgerService.createAccount(parsed.data);
      res.status(201).json({ account: mapAccount(account) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /api/accounts/:id
   */
  router.patch('/:id', (req: Request, res: Response, next: NextFunction) => {
    const parsed = updateAccountSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid account payload', parsed.error.flatten()));
    }

    try {
      const account = ledgerService.updateAccount(req.params.id, parsed.data);
      res.json({ account: mapAccount(account) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/accounts/:id - Removes the account and its transactions
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await ledgerService.deleteAccount(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
