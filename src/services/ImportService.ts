import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import type { ImportOutcome, ImportRun } from '../domain/entities/ImportRun.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { ImportConfig } from '../infra/importConfig.js';
import type { ImportRunRepository } from '../infra/repositories/ImportRunRepository.js';
import type { FileArchiver } from '../infra/FileArchiver.js';
import { formatForPath } from '../infra/TabularFileReader.js';
import type { ImportOptions, ImportOrchestrator } from './ImportOrchestrator.js';
import { logger } from '../infra/logger.js';

export interface PendingFile {
  fileName: string;
  path: string;
}

/**
 * ImportService - entry points for importing statements and reading import history
 */
export class ImportService {
  private inboxImportRunning = false;

  constructor(
    private config: ImportConfig,
    private orchestrator: ImportOrchestrator,
    private importRunRepo: ImportRunRepository,
    private archiver: FileArchiver
  ) {}

  async importFiles(paths: string[], options: ImportOptions = {}): Promise<ImportRun[]> {
    if (paths.length === 0) {
      throw new ValidationError('At least one file path is required');
    }
    return this.orchestrator.importFiles(paths, options);
  }

  /**
   * Imports files named by an outside caller; each path (absolute, or relative to the inbox)
   * must resolve to a file inside the inbox, since importing moves the file away
   */
  async importInboxFiles(paths: string[], options: ImportOptions = {}): Promise<ImportRun[]> {
    const inboxDir = resolve(this.config.inboxDir);
    const outside = paths.filter((path) => !isInside(inboxDir, resolve(inboxDir, path)));
    if (outside.length > 0) {
      throw new ValidationError('Paths must point into the inbox directory', { paths: outside });
    }
    return this.importFiles(
      paths.map((path) => resolve(inboxDir, path)),
      options
    );
  }

  /**
   * Statement files waiting directly in the inbox (subdirectories such as a nested archive are ignored)
   */
  async listPendingFiles(): Promise<PendingFile[]> {
    const inboxDir = resolve(this.config.inboxDir);

    let entries: Dirent[];
    try {
      entries = await readdir(inboxDir, { withFileTypes: true });
    } catch (error) {
      logger.warn('Inbox directory not readable', {
        inboxDir,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    return entries
      .filter((entry) => entry.isFile() && formatForPath(entry.name) !== null)
      .map((entry) => ({ fileName: entry.name, path: join(inboxDir, entry.name) }))
      .sort((a, b) => a.fileName.localeCompare(b.fileName));
  }

  /**
   * Imports everything in the inbox; overlapping calls return an empty batch
   */
  async importInbox(options: ImportOptions = {}): Promise<ImportRun[]> {
    if (this.inboxImportRunning) {
      logger.info('Inbox import already running, skipping');
      return [];
    }

    this.inboxImportRunning = true;
    try {
      const pending = await this.listPendingFiles();
      if (pending.length === 0) {
        return [];
      }
      logger.info('Importing inbox files', { count: pending.length });
      return await this.orchestrator.importFiles(
        pending.map((file) => file.path),
        options
      );
    } finally {
      this.inboxImportRunning = false;
    }
  }

  listImportRuns(params: { limit?: number; outcome?: ImportOutcome } = {}): ImportRun[] {
    return this.importRunRepo.list(params);
  }

  getImportRun(runId: string): ImportRun {
    const run = this.importRunRepo.getById(runId);
    if (!run) {
      throw new NotFoundError('ImportRun', runId);
    }
    return run;
  }

  /**
   * Moves an archived statement back into the inbox so it can be imported again
   */
  async restoreArchivedFile(archivedPath: string): Promise<string> {
    const archiveDir = resolve(this.config.archiveDir);
    const absolute = resolve(archivedPath);
    if (!isInside(archiveDir, absolute)) {
      throw new ValidationError('Path is not inside the archive directory', { archivedPath });
    }
    return this.archiver.restore(absolute, resolve(this.config.inboxDir), {
      timeoutMs: this.config.fileReadTimeoutMs,
    });
  }
}

function isInside(dir: string, absolutePath: string): boolean {
  return absolutePath.startsWith(dir + sep);
}
