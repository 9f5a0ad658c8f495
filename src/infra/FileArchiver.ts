import { constants } from 'node:fs';
import { copyFile, link, mkdir, unlink } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { ArchiveError } from '../domain/errors.js';
import { todayIsoDate } from '../domain/dates.js';
import { withTimeout } from './timeouts.js';
import { logger } from './logger.js';

export interface ArchiveOptions {
  now?: Date;
  retries?: number;
  /** Bound on each attempt; unbounded when omitted */
  timeoutMs?: number;
}

const MAX_SUFFIX = 1000;

/**
 * FileArchiver - moves consumed statement files into a date-partitioned archive
 * Targets are claimed with exclusive operations, so an existing file is never replaced.
 */
export class FileArchiver {
  constructor(private archiveDir: string) {}

  /**
   * Moves the file to <archiveDir>/YYYY/MM/DD/, retrying failed attempts
   */
  async archive(sourcePath: string, options: ArchiveOptions = {}): Promise<string> {
    const now = options.now ?? new Date();
    const retries = options.retries ?? 0;
    const targetDir = join(this.archiveDir, ...datePartition(now));

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const archivedPath = await bounded(`Archiving ${basename(sourcePath)}`, options.timeoutMs, () =>
          moveWithoutOverwrite(sourcePath, targetDir)
        );
        logger.info('Statement file archived', { sourcePath, archivedPath, attempt });
        return archivedPath;
      } catch (error) {
        lastError = error;
        logger.warn('Archive attempt failed', {
          sourcePath,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    throw new ArchiveError(`Could not archive ${basename(sourcePath)}`, {
      sourcePath,
      attempts: retries + 1,
      cause: lastError instanceof Error ? lastError.message : String(lastError),
    });
  }

  /**
   * Moves an archived file back into a directory (the inbox) under a free name
   */
  async restore(archivedPath: string, targetDir: string, options: { timeoutMs?: number } = {}): Promise<string> {
    try {
      const restoredPath = await bounded(`Restoring ${basename(archivedPath)}`, options.timeoutMs, () =>
        moveWithoutOverwrite(archivedPath, targetDir)
      );
      logger.info('Archived file restored', { archivedPath, restoredPath });
      return restoredPath;
    } catch (error) {
      throw new ArchiveError(`Could not restore ${basename(archivedPath)}`, {
        archivedPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export function datePartition(date: Date): [string, string, string] {
  const [year, month, day] = todayIsoDate(date).split('-');
  return [year, month, day];
}

/**
 * statement.csv, statement-1.csv, statement-2.csv, ...
 */
export function candidateName(fileName: string, attempt: number): string {
  if (attempt === 0) return fileName;
  const extension = extname(fileName);
  const stem = fileName.slice(0, fileName.length - extension.length);
  return `${stem}-${attempt}${extension}`;
}

async function moveWithoutOverwrite(sourcePath: string, targetDir: string): Promise<string> {
  await mkdir(targetDir, { recursive: true });
  const fileName = basename(sourcePath);

  for (let attempt = 0; attempt < MAX_SUFFIX; attempt++) {
    const targetPath = join(targetDir, candidateName(fileName, attempt));
    const claimed = await claimTarget(sourcePath, targetPath);
    if (claimed) {
      try {
        await unlink(sourcePath);
      } catch (error) {
        // Source remains; drop the claimed copy so a retry can reuse the name
        await discardTarget(targetPath);
        throw error;
      }
      return targetPath;
    }
  }

  throw new Error(`No free archive name for ${fileName} in ${targetDir}`);
}

/**
 * Creates targetPath with the source's content; false when the name is taken
 */
async function claimTarget(sourcePath: string, targetPath: string): Promise<boolean> {
  try {
    await link(sourcePath, targetPath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'EEXIST') return false;
    if (code !== 'EXDEV' && code !== 'EPERM' && code !== 'ENOTSUP') throw error;
  }

  // Hard links are not possible across devices; fall back to an exclusive copy
  try {
    await copyFile(sourcePath, targetPath, constants.COPYFILE_EXCL);
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') return false;
    // A copy that failed midway may have left a partial target behind
    await discardTarget(targetPath);
    throw error;
  }
}

async function discardTarget(targetPath: string): Promise<void> {
  try {
    await unlink(targetPath);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      logger.error('Could not remove abandoned archive copy', {
        targetPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function bounded<T>(operation: string, timeoutMs: number | undefined, run: () => Promise<T>): Promise<T> {
  return timeoutMs === undefined ? run() : withTimeout(operation, timeoutMs, run);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
