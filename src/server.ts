import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { AccountRepository } from './infra/repositories/AccountRepository.js';
import { TransactionRepository } from './infra/repositories/TransactionRepository.js';
import { ImportRunRepository } from './infra/repositories/ImportRunRepository.js';
import { LedgerStore } from './infra/LedgerStore.js';
import { FileArchiver } from './infra/FileArchiver.js';
import { importConfigFromEnv, loadBankProfiles } from './infra/importConfig.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { ImportOrchestrator } from './services/ImportOrchestrator.js';
import { ImportService } from './services/ImportService.js';
import { LedgerService } from './services/LedgerService.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { InboxScheduler } from './scheduler/InboxScheduler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Import configuration (fail-fast on invalid bank profiles)
const profiles = await loadBankProfiles(env.BANK_PROFILES_PATH);
const importConfig = importConfigFromEnv(env, profiles);

// Infrastructure
const db = new DatabaseAdapter({ path: env.SQLITE_DB_PATH, busyTimeoutMs: importConfig.storageTimeoutMs });
const accountRepo = new AccountRepository(db);
const transactionRepo = new TransactionRepository(db);
const importRunRepo = new ImportRunRepository(db);
const ledgerStore = new LedgerStore(db, accountRepo, transactionRepo, importConfig.storageTimeoutMs);
const archiver = new FileArchiver(importConfig.archiveDir);

// Services
const orchestrator = new ImportOrchestrator(importConfig, importRunRepo, ledgerStore, archiver);
const importService = new ImportService(importConfig, orchestrator, importRunRepo, archiver);
const ledgerService = new LedgerService(accountRepo, transactionRepo, ledgerStore);

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: '1mb' }));

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Readiness endpoint
app.get('/ready', (_req: Request, res: Response) => {
  try {
    db.queryOne('SELECT 1 as ok');
    res.json({ status: 'ready' });
  } catch {
    res.status(503).json({ status: 'not-ready' });
  }
});

// Mount API routes
app.use(
  '/api',
  createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS }),
  createApiRouter({ importService, ledgerService })
);

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

const scheduler = new InboxScheduler(importService, env.INBOX_SCAN_INTERVAL_MINUTES);

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    profiles: profiles.map((profile) => profile.id),
  });
  scheduler.start();
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  scheduler.stop();
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
