import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  ImportOutcome,
  ImportRun,
  ImportRunResult,
  ImportStage,
  RowError,
} from '../../domain/entities/ImportRun.js';
import { StorageError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type ImportRunRow = {
  id: string;
  source_path: string;
  profile_id: string | null;
  account_id: string | null;
  stage: ImportStage;
  outcome: ImportOutcome | null;
  started_at: string;
  completed_at: string | null;
  rows_seen: number;
  rows_imported: number;
  rows_duplicate: number;
  rows_invalid: number;
  failure_reason: string | null;
  archived_path: string | null;
  warnings: string;
  row_errors: string;
};

export class ImportRunRepository {
  constructor(private db: DatabaseAdapter) {}

  create(run: ImportRun): void {
    const sql = `
      INSERT INTO import_runs (id, source_path, stage, started_at)
      VALUES (?, ?, ?, ?)
    `;

    this.db.execute(sql, [run.id, run.sourcePath, run.stage, run.startedAt.toISOString()]);
    logger.debug('Import run created', { importRunId: run.id, sourcePath: run.sourcePath });
  }

  /**
   * Writes the terminal state of a run. A run can be finalized only once.
   */
  finalize(params: {
    runId: string;
    result: ImportRunResult;
    outcome: ImportOutcome;
    completedAt: Date;
  }): void {
    const { result } = params;
    const sql = `
      UPDATE import_runs
      SET profile_id = ?, account_id = ?, stage = ?, outcome = ?, completed_at = ?,
          rows_seen = ?, rows_imported = ?, rows_duplicate = ?, rows_invalid = ?,
          failure_reason = ?, archived_path = ?, warnings = ?, row_errors = ?
      WHERE id = ? AND completed_at IS NULL
    `;

    const changes = this.db.execute(sql, [
      result.profileId,
      result.accountId,
      result.stage,
      params.outcome,
      params.completedAt.toISOString(),
      result.rowsSeen,
      result.rowsImported,
      result.rowsDuplicate,
      result.rowsInvalid,
      result.failureReason,
      result.archivedPath,
      JSON.stringify(result.warnings),
      JSON.stringify(result.rowErrors),
      params.runId,
    ]);

    if (changes !== 1) {
      throw new StorageError('Import run is missing or already finalized', { runId: params.runId });
    }
  }

  getById(runId: string): ImportRun | null {
    const row = this.db.queryOne<ImportRunRow>('SELECT * FROM import_runs WHERE id = ?', [runId]);
    return row ? this.mapRowToImportRun(row) : null;
  }

  list(params: { limit?: number; outcome?: ImportOutcome } = {}): ImportRun[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (params.outcome) {
      conditions.push('outcome = ?');
      values.push(params.outcome);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = Math.min(params.limit ?? 50, 500);
    const sql = `
      SELECT * FROM import_runs
      ${where}
      ORDER BY started_at DESC, rowid DESC
      LIMIT ?
    `;

    const rows = this.db.query<ImportRunRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToImportRun(row));
  }

  private mapRowToImportRun(row: ImportRunRow): ImportRun {
    return {
      id: row.id,
      sourcePath: row.source_path,
      profileId: row.profile_id,
      accountId: row.account_id,
      stage: row.stage,
      outcome: row.outcome,
      startedAt: new Date(row.started_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      rowsSeen: row.rows_seen,
      rowsImported: row.rows_imported,
      rowsDuplicate: row.rows_duplicate,
      rowsInvalid: row.rows_invalid,
      failureReason: row.failure_reason,
      archivedPath: row.archived_path,
      warnings: JSON.parse(row.warnings) as string[],
      rowErrors: JSON.parse(row.row_errors) as RowError[],
    };
  }
}
