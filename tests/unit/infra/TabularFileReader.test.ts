import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { FileError } from '../../../src/domain/errors.js';
import { formatForPath, parseCsv, readTabularFile } from '../../../src/infra/TabularFileReader.js';

describe('TabularFileReader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should map extensions to formats', () => {
    expect(formatForPath('/inbox/Statement.CSV')).toBe('csv');
    expect(formatForPath('/inbox/statement.xls')).toBe('xlsx');
    expect(formatForPath('/inbox/notes.txt')).toBeNull();
  });

  it('should strip the byte-order mark, trim cells and drop blank lines', () => {
    const records = parseCsv(
      Buffer.from('\uFEFFDate,Description,Amount\r\n2024-01-05, COFFEE SHOP ,-4.50\r\n\r\n', 'utf-8')
    );

    expect(records).toEqual([
      ['Date', 'Description', 'Amount'],
      ['2024-01-05', 'COFFEE SHOP', '-4.50'],
    ]);
  });

  it('should keep quoted commas inside a cell', () => {
    const records = parseCsv(Buffer.from('Date,Description,Amount\n2024-01-07,"PAYCHECK, ACME",1000.00\n'));
    expect(records[1]).toEqual(['2024-01-07', 'PAYCHECK, ACME', '1000.00']);
  });

  it('should read a spreadsheet from its first sheet', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Date', 'Description', 'Amount'],
        ['2024-01-05', 'Coffee', -4.5],
      ]),
      'Transactions'
    );
    const path = join(dir, 'statement.xlsx');
    await writeFile(path, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const file = await readTabularFile(path, 1000);

    expect(file.format).toBe('xlsx');
    expect(file.records).toEqual([
      ['Date', 'Description', 'Amount'],
      ['2024-01-05', 'Coffee', -4.5],
    ]);
  });

  it('should reject unsupported extensions', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'hello');

    await expect(readTabularFile(path, 1000)).rejects.toThrow('Unsupported file type: notes.txt');
  });

  it('should reject missing files as unreadable', async () => {
    const error = await readTabularFile(join(dir, 'missing.csv'), 1000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileError);
    expect(error instanceof FileError && error.reason).toBe('unreadable');
  });

  it('should reject files without rows', async () => {
    const path = join(dir, 'empty.csv');
    await writeFile(path, '\n\n');

    await expect(readTabularFile(path, 1000)).rejects.toThrow('empty.csv contains no rows');
  });
});
