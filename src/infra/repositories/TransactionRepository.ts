import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  PendingTransaction,
  Transaction,
  TransactionFilters,
} from '../../domain/entities/Transaction.js';

type TransactionRow = {
  id: string;
  account_id: string;
  posted_date: string;
  amount_cents: number;
  description: string;
  category: string | null;
  fingerprint: string;
  import_run_id: string | null;
  created_at: string;
};

export class TransactionRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Append-only insert; callers run this inside a commit batch transaction
   */
  insert(params: {
    accountId: string;
    importRunId: string | null;
    transaction: PendingTransaction;
    createdAt: Date;
  }): void {
    const { transaction } = params;
    const sql = `
      INSERT INTO transactions (
        id, account_id, posted_date, amount_cents, description, category, fingerprint, import_run_id, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      transaction.id,
      params.accountId,
      transaction.postedDate,
      transaction.amountCents,
      transaction.description,
      transaction.category,
      transaction.fingerprint,
      params.importRunId,
      params.createdAt.toISOString(),
    ]);
  }

  hasFingerprint(accountId: string, fingerprint: string): boolean {
    const row = this.db.queryOne<{ found: number }>(
      'SELECT 1 AS found FROM transactions WHERE account_id = ? AND fingerprint = ?',
      [accountId, fingerprint]
    );
    return row !== null;
  }

  listFingerprints(accountId: string): Set<string> {
    const rows = this.db.query<{ fingerprint: string }>(
      'SELECT fingerprint FROM transactions WHERE account_id = ?',
      [accountId]
    );
    return new Set(rows.map((row) => row.fingerprint));
  }

  list(filters: TransactionFilters = {}): Transaction[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filters.accountId) {
      conditions.push('account_id = ?');
      values.push(filters.accountId);
    }
    if (filters.dateRange?.from) {
      conditions.push('posted_date >= ?');
      values.push(filters.dateRange.from);
    }
    if (filters.dateRange?.to) {
      conditions.push('posted_date <= ?');
      values.push(filters.dateRange.to);
    }
    if (filters.category !== undefined) {
      conditions.push('category = ?');
      values.push(filters.category);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `
      SELECT * FROM transactions
      ${where}
      ORDER BY posted_date DESC, created_at DESC, id ASC
    `;

    const rows = this.db.query<TransactionRow>(sql, values);
    return rows.map((row) => this.mapRowToTransaction(row));
  }

  updateCategory(transactionId: string, category: string | null): number {
    return this.db.execute('UPDATE transactions SET category = ? WHERE id = ?', [
      category,
      transactionId,
    ]);
  }

  deleteAll(): number {
    return this.db.execute('DELETE FROM transactions');
  }

  private mapRowToTransaction(row: TransactionRow): Transaction {
    return {
      id: row.id,
      accountId: row.account_id,
      postedDate: row.posted_date,
      amountCents: row.amount_cents,
      description: row.description,
      category: row.category,
      fingerprint: row.fingerprint,
      importRunId: row.import_run_id,
      createdAt: new Date(row.created_at),
    };
  }
}
