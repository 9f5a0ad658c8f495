import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { StorageError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface DatabaseOptions {
  path: string;
  busyTimeoutMs: number;
}

/**
 * SQLite database adapter
 * Services never import this directly - repositories receive it via constructor
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(options: DatabaseOptions) {
    try {
      if (options.path !== ':memory:') {
        mkdirSync(dirname(options.path), { recursive: true });
      }
      this.db = new Database(options.path, { timeout: options.busyTimeoutMs });
      this.db.pragma('journal_mode = WAL'); // Write-Ahead Logging for better concurrency
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
      logger.info('Database initialized', { path: options.path });
    } catch (error) {
      throw new StorageError('Failed to initialize database', { error });
    }
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, 'db', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
      logger.debug('Database schema initialized');
    } catch (error) {
      throw new StorageError('Failed to initialize database schema', { error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new StorageError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare(sql);
      return (stmt.get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new StorageError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new StorageError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in a transaction
   * Rolls back on any error; application errors pass through unchanged
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn();
    } catch (error) {
      logger.error('Transaction failed, rolling back', { error });
      if (isAppError(error)) {
        throw error;
      }
      throw new StorageError('Transaction failed', { error });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
