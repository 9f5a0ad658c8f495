import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Account, AccountUpdate } from '../../domain/entities/Account.js';
import { logger } from '../logger.js';

type AccountRow = {
  id: string;
  name: string;
  institution_id: string;
  import_key: string | null;
  balance_cents: number;
  created_at: string;
  updated_at: string;
};

export class AccountRepository {
  constructor(private db: DatabaseAdapter) {}

  create(account: Account): void {
    const sql = `
      INSERT INTO accounts (id, name, institution_id, import_key, balance_cents, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      account.id,
      account.name,
      account.institutionId,
      account.importKey,
      account.balanceCents,
      account.createdAt.toISOString(),
      account.updatedAt.toISOString(),
    ]);

    logger.debug('Account created', { accountId: account.id, institutionId: account.institutionId });
  }

  getById(accountId: string): Account | null {
    const row = this.db.queryOne<AccountRow>('SELECT * FROM accounts WHERE id = ?', [accountId]);
    return row ? this.mapRowToAccount(row) : null;
  }

  findByInstitutionAndName(institutionId: string, name: string): Account | null {
    const row = this.db.queryOne<AccountRow>(
      'SELECT * FROM accounts WHERE institution_id = ? AND name = ?',
      [institutionId, name]
    );
    return row ? this.mapRowToAccount(row) : null;
  }

  findByImportKey(importKey: string): Account | null {
    const row = this.db.queryOne<AccountRow>('SELECT * FROM accounts WHERE import_key = ?', [importKey]);
    return row ? this.mapRowToAccount(row) : null;
  }

  /**
   * Binds a hand-made account to an import key; a key, once set, is never replaced
   */
  assignImportKey(accountId: string, importKey: string, updatedAt: Date): number {
    return this.db.execute(
      'UPDATE accounts SET import_key = ?, updated_at = ? WHERE id = ? AND import_key IS NULL',
      [importKey, updatedAt.toISOString(), accountId]
    );
  }

  list(): Account[] {
    const rows = this.db.query<AccountRow>('SELECT * FROM accounts ORDER BY name ASC');
    return rows.map((row) => this.mapRowToAccount(row));
  }

  update(accountId: string, changes: AccountUpdate, updatedAt: Date): number {
    const assignments: string[] = [];
    const values: unknown[] = [];

    if (changes.name !== undefined) {
      assignments.push('name = ?');
      values.push(changes.name);
    }
    if (changes.institutionId !== undefined) {
      assignments.push('institution_id = ?');
      values.push(changes.institutionId);
    }
    assignments.push('updated_at = ?');
    values.push(updatedAt.toISOString());

    const sql = `UPDATE accounts SET ${assignments.join(', ')} WHERE id = ?`;
    return this.db.execute(sql, [...values, accountId]);
  }

  /**
   * Transactions are removed by the ON DELETE CASCADE on transactions.account_id
   */
  delete(accountId: string): number {
    return this.db.execute('DELETE FROM accounts WHERE id = ?', [accountId]);
  }

  adjustBalance(accountId: string, deltaCents: number, updatedAt: Date): void {
    const changes = this.db.execute(
      'UPDATE accounts SET balance_cents = balance_cents + ?, updated_at = ? WHERE id = ?',
      [deltaCents, updatedAt.toISOString(), accountId]
    );
    if (changes !== 1) {
      throw new Error(`Account ${accountId} disappeared during balance update`);
    }
  }

  resetAllBalances(updatedAt: Date): void {
    this.db.execute('UPDATE accounts SET balance_cents = 0, updated_at = ?', [
      updatedAt.toISOString(),
    ]);
  }

  private mapRowToAccount(row: AccountRow): Account {
    return {
      id: row.id,
      name: row.name,
      institutionId: row.institution_id,
      importKey: row.import_key,
      balanceCents: row.balance_cents,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
