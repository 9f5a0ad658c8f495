/**
 * ImportRun entity - append-only audit record of one file's import
 * Created when processing starts, finalized exactly once
 */
export type ImportStage =
  | 'detecting'
  | 'mapping'
  | 'validating'
  | 'deduplicating'
  | 'persisting'
  | 'archiving'
  | 'done'
  | 'failed';

export type ImportOutcome = 'succeeded' | 'partially_succeeded' | 'failed';

export type RowErrorCode =
  | 'MISSING_COLUMN'
  | 'INVALID_DATE'
  | 'INVALID_AMOUNT'
  | 'DATE_IN_FUTURE'
  | 'ZERO_AMOUNT'
  | 'AMOUNT_OUT_OF_RANGE'
  | 'EMPTY_DESCRIPTION'
  | 'ACCOUNT_UNRESOLVED'
  | 'DUPLICATE';

export type RowErrorKind = 'mapping' | 'validation' | 'duplicate';

export interface RowError {
  row: number;
  kind: RowErrorKind;
  code: RowErrorCode;
  message: string;
}

export interface ImportCounts {
  rowsSeen: number;
  rowsImported: number;
  rowsDuplicate: number;
  rowsInvalid: number;
}

export interface ImportRun extends ImportCounts {
  id: string;
  sourcePath: string;
  profileId: string | null;
  accountId: string | null;
  stage: ImportStage;
  outcome: ImportOutcome | null;
  startedAt: Date;
  completedAt: Date | null;
  failureReason: string | null;
  archivedPath: string | null;
  warnings: string[];
  rowErrors: RowError[];
}

export interface ImportRunResult extends ImportCounts {
  stage: 'done' | 'failed';
  profileId: string | null;
  accountId: string | null;
  failureReason: string | null;
  archivedPath: string | null;
  warnings: string[];
  rowErrors: RowError[];
}

export function createImportRun(params: { id: string; sourcePath: string }): ImportRun {
  return {
    id: params.id,
    sourcePath: params.sourcePath,
    profileId: null,
    accountId: null,
    stage: 'detecting',
    outcome: null,
    startedAt: new Date(),
    completedAt: null,
    rowsSeen: 0,
    rowsImported: 0,
    rowsDuplicate: 0,
    rowsInvalid: 0,
    failureReason: null,
    archivedPath: null,
    warnings: [],
    rowErrors: [],
  };
}

export function emptyCounts(): ImportCounts {
  return { rowsSeen: 0, rowsImported: 0, rowsDuplicate: 0, rowsInvalid: 0 };
}

/**
 * A failed stage always means a failed run; a finished file with rejected rows
 * or an archive warning is only partially successful
 */
export function resolveOutcome(result: ImportRunResult): ImportOutcome {
  if (result.stage === 'failed') {
    return 'failed';
  }
  if (result.rowsInvalid > 0 || result.archivedPath === null) {
    return 'partially_succeeded';
  }
  return 'succeeded';
}
