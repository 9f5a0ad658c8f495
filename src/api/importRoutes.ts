import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { ImportService } from '../services/ImportService.js';
import { mapImportRun } from './mappers.js';

const importRequestSchema = z.object({
  paths: z.array(z.string().trim().min(1)).min(1).max(200),
});

const restoreRequestSchema = z.object({
  archivedPath: z.string().trim().min(1),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  outcome: z.enum(['succeeded', 'partially_succeeded', 'failed']).optional(),
});

export function createImportRouter(importService: ImportService): Router {
  const router = Router();

  /**
   * POST /api/imports - Import the given statement files (inbox paths only)
   * Aborts in-flight files that have not committed when the client disconnects
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = importRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid import request', parsed.error.flatten()));
    }

    const controller = new AbortController();
    const abortOnDisconnect = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on('close', abortOnDisconnect);

    try {
      const runs = await importService.importInboxFiles(parsed.data.paths, { signal: controller.signal });
      res.json({ runs: runs.map(mapImportRun) });
    } catch (error) {
      next(error);
    } finally {
      res.off('close', abortOnDisconnect);
    }
  });

  /**
   * POST /api/imports/inbox - Import every pending file in the inbox
   */
  router.post('/inbox', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const runs = await importService.importInbox();
      res.json({ runs: runs.map(mapImportRun) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/imports/pending - Files waiting in the inbox
   */
  router.get('/pending', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ files: await importService.listPendingFiles() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/imports/restore - Move an archived file back into the inbox
   */
  router.post('/restore', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = restoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid restore request', parsed.error.flatten()));
    }

    try {
      const restoredPath = await importService.restoreArchivedFile(parsed.data.archivedPath);
      res.json({ restoredPath });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/imports - Import history, newest first
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new ValidationError('Invalid query', parsed.error.flatten());
      }
      res.json({ runs: importService.listImportRuns(parsed.data).map(mapImportRun) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/imports/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ run: mapImportRun(importService.getImportRun(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
