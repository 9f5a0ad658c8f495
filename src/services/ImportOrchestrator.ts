import { randomUUID } from 'node:crypto';
import { basename } from 'node:path';
import {
  createImportRun,
  emptyCounts,
  resolveOutcome,
  type ImportRun,
  type ImportRunResult,
  type ImportStage,
  type RowError,
} from '../domain/entities/ImportRun.js';
import type { TransactionDraft } from '../domain/entities/Transaction.js';
import type { ImportAccountTarget } from '../domain/entities/Account.js';
import { FileError, ImportCanceledError, errorMessage, isAppError } from '../domain/errors.js';
import { detectFormat } from '../domain/import/formatDetector.js';
import { extractRows, mapRow } from '../domain/import/profileMapper.js';
import { validateDraft } from '../domain/import/transactionValidator.js';
import { resolveAccountTarget } from '../domain/import/accountTarget.js';
import type { ImportConfig } from '../infra/importConfig.js';
import type { ImportRunRepository } from '../infra/repositories/ImportRunRepository.js';
import type { LedgerStore } from '../infra/LedgerStore.js';
import type { FileArchiver } from '../infra/FileArchiver.js';
import { readTabularFile } from '../infra/TabularFileReader.js';
import { DuplicateDetector, type FingerprintedDraft } from './DuplicateDetector.js';
import { logger } from '../infra/logger.js';

export interface ImportOptions {
  signal?: AbortSignal;
}

/**
 * Mutable per-file state while the pipeline runs; frozen into the run on finalize
 */
type FileProgress = Omit<ImportRunResult, 'stage'> & { stage: ImportStage };

/**
 * ImportOrchestrator - drives one statement file through
 * detecting → mapping → validating → deduplicating → persisting → archiving → done
 *
 * Row problems are counted, never fatal. File-level problems (unreadable file,
 * unknown layout, storage failure, timeout, cancellation before commit) end the
 * file in `failed`. Every path yields exactly one finalized import run.
 */
export class ImportOrchestrator {
  private duplicateDetector: DuplicateDetector;

  constructor(
    private config: ImportConfig,
    private importRunRepo: ImportRunRepository,
    private ledgerStore: LedgerStore,
    private archiver: FileArchiver
  ) {
    this.duplicateDetector = new DuplicateDetector(ledgerStore);
  }

  /**
   * Imports files with bounded parallelism; results keep the input order
   */
  async importFiles(paths: string[], options: ImportOptions = {}): Promise<ImportRun[]> {
    const results: ImportRun[] = new Array<ImportRun>(paths.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < paths.length) {
        const index = nextIndex++;
        results[index] = await this.importFile(paths[index], options);
      }
    };

    const workerCount = Math.min(this.config.maxParallelFiles, paths.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    logger.info('Import batch finished', {
      files: paths.length,
      succeeded: results.filter((run) => run.outcome === 'succeeded').length,
      failed: results.filter((run) => run.outcome === 'failed').length,
    });
    return results;
  }

  async importFile(sourcePath: string, options: ImportOptions = {}): Promise<ImportRun> {
    const run = createImportRun({ id: randomUUID(), sourcePath });
    let recorded = true;
    try {
      this.importRunRepo.create(run);
    } catch (error) {
      recorded = false;
      logger.error('Could not record import run start', { sourcePath, error: errorMessage(error) });
    }

    const progress: FileProgress = {
      ...emptyCounts(),
      stage: 'detecting',
      profileId: null,
      accountId: null,
      failureReason: null,
      archivedPath: null,
      warnings: [],
      rowErrors: [],
    };

    let result: ImportRunResult;
    if (!recorded) {
      result = { ...progress, stage: 'failed', failureReason: 'Could not record import run' };
    } else {
      result = await this.runPipeline(sourcePath, run.id, progress, options.signal);
    }

    return this.finalize(run, result, recorded);
  }

  private async runPipeline(
    sourcePath: string,
    runId: string,
    progress: FileProgress,
    signal: AbortSignal | undefined
  ): Promise<ImportRunResult> {
    try {
      // Detecting
      throwIfAborted(signal);
      const file = await readTabularFile(sourcePath, this.config.fileReadTimeoutMs);
      const detection = detectFormat(file, this.config.profiles);
      if (detection.kind === 'unrecognized') {
        throw new FileError(`Unrecognized statement format: ${basename(sourcePath)}`, 'unsupported_format', {
          headers: detection.headers,
        });
      }
      const { profile } = detection;
      progress.profileId = profile.id;

      // Mapping
      progress.stage = 'mapping';
      throwIfAborted(signal);
      const rows = extractRows(file, detection.headerIndex);
      progress.rowsSeen = rows.length;
      const drafts: TransactionDraft[] = [];
      for (const row of rows) {
        const mapped = mapRow(row, profile);
        if (mapped.ok) {
          drafts.push(mapped.draft);
        } else {
          this.rejectRows(progress, [mapped.error]);
        }
      }

      // Validating
      progress.stage = 'validating';
      const accountTarget = resolveAccountTarget(profile, sourcePath);
      const existingAccount = this.ledgerStore.resolveImportAccount(accountTarget);
      if (existingAccount) {
        progress.accountId = existingAccount.id;
      }
      const validationContext = {
        accountResolvable: existingAccount !== null || this.config.accountPolicy === 'auto_create',
        futureDateToleranceDays: this.config.futureDateToleranceDays,
        maxAmountCents: this.config.maxAmountCents,
      };
      const validDrafts: TransactionDraft[] = [];
      for (const draft of drafts) {
        const issues = validateDraft(draft, validationContext);
        if (issues.length === 0) {
          validDrafts.push(draft);
        } else {
          this.rejectRows(progress, issues);
        }
      }

      // Deduplicating
      progress.stage = 'deduplicating';
      throwIfAborted(signal);
      let pending: FingerprintedDraft[] = [];
      if (validDrafts.length > 0) {
        const accountId = this.accountFor(accountTarget);
        progress.accountId = accountId;
        const { unique, duplicates } = this.duplicateDetector.partition(accountId, validDrafts);
        pending = unique;
        progress.rowsDuplicate += duplicates.length;
        progress.rowErrors.push(...duplicates);
      }

      // Persisting: cancellation is honoured up to the commit, never after it
      progress.stage = 'persisting';
      throwIfAborted(signal);
      if (pending.length > 0 && progress.accountId) {
        const commit = await this.ledgerStore.commitBatch({
          accountId: progress.accountId,
          importRunId: runId,
          signal,
          transactions: pending.map((draft) => ({
            id: randomUUID(),
            postedDate: draft.postedDate,
            amountCents: draft.amountCents,
            description: draft.description.trim(),
            category: draft.category,
            fingerprint: draft.fingerprint,
          })),
        });
        progress.rowsImported = commit.inserted.length;
        if (commit.skippedFingerprints.length > 0) {
          const skipped = new Set(commit.skippedFingerprints);
          const raced = pending.filter((draft) => skipped.has(draft.fingerprint));
          progress.rowsDuplicate += raced.length;
          progress.rowErrors.push(
            ...raced.map(
              (draft): RowError => ({
                row: draft.rowNumber,
                kind: 'duplicate',
                code: 'DUPLICATE',
                message: 'Committed by another import while this file was processed',
              })
            )
          );
        }
      }

      // Archiving
      progress.stage = 'archiving';
      try {
        progress.archivedPath = await this.archiver.archive(sourcePath, {
          retries: this.config.archiveRetries,
          timeoutMs: this.config.fileReadTimeoutMs,
        });
      } catch (error) {
        progress.warnings.push(`Imported but not archived: ${errorMessage(error)}`);
        logger.warn('Statement imported but left in place', { sourcePath, error: errorMessage(error) });
      }

      return { ...progress, stage: 'done' };
    } catch (error) {
      const failedAt = progress.stage;
      logger.error('Statement import failed', {
        sourcePath,
        stage: failedAt,
        code: isAppError(error) ? error.code : undefined,
        error: errorMessage(error),
      });
      return {
        ...progress,
        stage: 'failed',
        rowsImported: 0,
        failureReason: `${failedAt}: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * Also binds a matching hand-made account to the target's import key
   */
  private accountFor(target: ImportAccountTarget): string {
    return this.ledgerStore.findOrCreateAccount(target).account.id;
  }

  private rejectRows(progress: FileProgress, errors: RowError[]): void {
    progress.rowsInvalid += 1;
    progress.rowErrors.push(...errors);
  }

  private finalize(run: ImportRun, result: ImportRunResult, recorded: boolean): ImportRun {
    const outcome = resolveOutcome(result);
    const completedAt = new Date();

    if (recorded) {
      try {
        this.importRunRepo.finalize({ runId: run.id, result, outcome, completedAt });
      } catch (error) {
        logger.error('Could not finalize import run', { importRunId: run.id, error: errorMessage(error) });
      }
    }

    logger.info('Statement import finished', {
      importRunId: run.id,
      sourcePath: run.sourcePath,
      profileId: result.profileId,
      outcome,
      rowsSeen: result.rowsSeen,
      rowsImported: result.rowsImported,
      rowsDuplicate: result.rowsDuplicate,
      rowsInvalid: result.rowsInvalid,
    });

    return { ...run, ...result, outcome, completedAt };
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ImportCanceledError();
  }
}
