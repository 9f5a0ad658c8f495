import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { FileError, isAppError } from '../domain/errors.js';
import { withTimeout } from './timeouts.js';
import { logger } from './logger.js';

export type Cell = string | number;

export type TabularFormat = 'csv' | 'xlsx';

/**
 * A statement file as rows of cells, header row(s) included
 */
export interface TabularFile {
  path: string;
  format: TabularFormat;
  records: Cell[][];
}

const EXTENSION_FORMATS: Record<string, TabularFormat> = {
  '.csv': 'csv',
  '.xlsx': 'xlsx',
  '.xls': 'xlsx',
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_FORMATS);

export function formatForPath(path: string): TabularFormat | null {
  return EXTENSION_FORMATS[extname(path).toLowerCase()] ?? null;
}

/**
 * Reads a CSV or spreadsheet export into records
 * Throws FileError for unsupported extensions, unreadable or empty files
 */
export async function readTabularFile(path: string, timeoutMs: number): Promise<TabularFile> {
  const format = formatForPath(path);
  if (!format) {
    throw new FileError(`Unsupported file type: ${basename(path)}`, 'unsupported_format', {
      path,
      supported: SUPPORTED_EXTENSIONS,
    });
  }

  let buffer: Buffer;
  try {
    buffer = await withTimeout(`Reading ${basename(path)}`, timeoutMs, () => readFile(path));
  } catch (error) {
    if (isAppError(error)) throw error;
    throw new FileError(`Could not read ${basename(path)}`, 'unreadable', {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const records = format === 'csv' ? parseCsv(buffer, path) : parseWorkbook(buffer, path);
  if (records.length === 0) {
    throw new FileError(`${basename(path)} contains no rows`, 'empty', { path });
  }

  return { path, format, records };
}

export function parseCsv(buffer: Buffer, path = 'inline.csv'): Cell[][] {
  // UTF-8 with an optional byte-order mark
  const content = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const result = Papa.parse<string[]>(content, {
    skipEmptyLines: 'greedy',
  });

  if (result.errors.length > 0) {
    logger.warn('CSV parse reported issues', {
      path,
      errors: result.errors.slice(0, 5).map((err) => ({ row: err.row, message: err.message })),
    });
  }

  return result.data.map((record) => record.map((cell) => cell.trim()));
}

function parseWorkbook(buffer: Buffer, path: string): Cell[][] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' });
  } catch (error) {
    throw new FileError(`Could not parse spreadsheet ${basename(path)}`, 'unreadable', {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return [];
  }

  // Dates stay as serial numbers; the mapper converts them
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: true,
    blankrows: false,
  });

  return rows.map((row) => row.map(toCell));
}

function toCell(value: unknown): Cell {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value.trim();
  if (value === null || value === undefined) return '';
  return String(value).trim();
}
