import { Router } from 'express';
import { createImportRouter } from './importRoutes.js';
import { createTransactionRouter } from './transactionRoutes.js';
import { createAccountRouter } from './accountRoutes.js';
import type { ImportService } from '../services/ImportService.js';
import type { LedgerService } from '../services/LedgerService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from server.ts
 */
export function createApiRouter(deps: {
  importService: ImportService;
  ledgerService: LedgerService;
}): Router {
  const router = Router();

  router.use('/imports', createImportRouter(deps.importService));
  router.use('/transactions', createTransactionRouter(deps.ledgerService));
  router.use('/accounts', createAccountRouter(deps.ledgerService));

  return router;
}
