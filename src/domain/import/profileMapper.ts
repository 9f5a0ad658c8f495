import { normalizeHeader, type BankProfile } from '../entities/BankProfile.js';
import type { TransactionDraft } from '../entities/Transaction.js';
import type { RowError } from '../entities/ImportRun.js';
import { parseAmountToCents } from '../money.js';
import { parsePostedDate } from '../dates.js';
import type { Cell, TabularFile } from '../../infra/TabularFileReader.js';

/**
 * One data row keyed by normalized header name
 */
export interface RawRow {
  rowNumber: number;
  values: Map<string, Cell>;
}

export type MapResult = { ok: true; draft: TransactionDraft } | { ok: false; error: RowError };

/**
 * Turns the records below the detected header into keyed rows
 * rowNumber is the 1-based line of the record in the file.
 */
export function extractRows(file: TabularFile, headerIndex: number): RawRow[] {
  const headers = file.records[headerIndex].map((cell) => normalizeHeader(String(cell)));
  const rows: RawRow[] = [];

  for (let index = headerIndex + 1; index < file.records.length; index++) {
    const record = file.records[index];
    if (record.every((cell) => cell === '')) continue;

    const values = new Map<string, Cell>();
    headers.forEach((header, column) => {
      if (header.length > 0 && !values.has(header)) {
        values.set(header, record[column] ?? '');
      }
    });
    rows.push({ rowNumber: index + 1, values });
  }

  return rows;
}

/**
 * Maps one raw row to a canonical draft using the profile's descriptor
 * Pure: the outcome depends only on the row and the profile.
 */
export function mapRow(row: RawRow, profile: BankProfile): MapResult {
  const { columns } = profile;
  const fail = (code: RowError['code'], message: string): MapResult => ({
    ok: false,
    error: { row: row.rowNumber, kind: 'mapping', code, message },
  });

  const rawDate = cellOf(row, columns.postedDate);
  if (rawDate === undefined) {
    return fail('MISSING_COLUMN', `Missing value for "${columns.postedDate}"`);
  }
  const postedDate = parsePostedDate(rawDate, profile.dateFormats);
  if (!postedDate) {
    return fail('INVALID_DATE', `Unparseable date "${String(rawDate)}"`);
  }

  if (!row.values.has(normalizeHeader(columns.description))) {
    return fail('MISSING_COLUMN', `Missing column "${columns.description}"`);
  }

  const amount = resolveAmount(row, profile);
  if (!amount.ok) {
    return fail(amount.code, amount.message);
  }

  return {
    ok: true,
    draft: {
      rowNumber: row.rowNumber,
      postedDate,
      amountCents: amount.cents,
      description: buildDescription(row, profile),
      category: textOf(row, columns.category) ?? null,
    },
  };
}

type AmountResult =
  | { ok: true; cents: number }
  | { ok: false; code: 'MISSING_COLUMN' | 'INVALID_AMOUNT'; message: string };

function resolveAmount(row: RawRow, profile: BankProfile): AmountResult {
  const { columns, amountConvention } = profile;

  if (amountConvention.kind === 'debit_credit_columns') {
    const debit = parseOptionalAmount(row, columns.debit);
    const credit = parseOptionalAmount(row, columns.credit);
    if (!debit.ok) return debit;
    if (!credit.ok) return credit;
    if (debit.cents === null && credit.cents === null) {
      return {
        ok: false,
        code: 'MISSING_COLUMN',
        message: `Neither "${columns.debit}" nor "${columns.credit}" has a value`,
      };
    }
    if (debit.cents && credit.cents) {
      return { ok: false, code: 'INVALID_AMOUNT', message: 'Both debit and credit are filled' };
    }
    if (debit.cents) {
      return { ok: true, cents: -Math.abs(debit.cents) };
    }
    return { ok: true, cents: Math.abs(credit.cents ?? 0) };
  }

  const parsed = parseOptionalAmount(row, columns.amount);
  if (!parsed.ok) return parsed;
  if (parsed.cents === null) {
    return { ok: false, code: 'MISSING_COLUMN', message: `Missing value for "${columns.amount}"` };
  }

  switch (amountConvention.kind) {
    case 'signed':
      return { ok: true, cents: parsed.cents };
    case 'inverted':
      return { ok: true, cents: parsed.cents === 0 ? 0 : -parsed.cents };
    case 'type_column': {
      const type = (textOf(row, columns.type) ?? '').toLowerCase();
      const isDebit = amountConvention.debitTypes.some((debitType) => debitType.toLowerCase() === type);
      const magnitude = Math.abs(parsed.cents);
      return { ok: true, cents: isDebit && magnitude !== 0 ? -magnitude : magnitude };
    }
  }
}

function parseOptionalAmount(
  row: RawRow,
  column: string | undefined
): { ok: true; cents: number | null } | { ok: false; code: 'MISSING_COLUMN' | 'INVALID_AMOUNT'; message: string } {
  if (!column) {
    return { ok: false, code: 'MISSING_COLUMN', message: 'Profile has no amount column' };
  }
  if (!row.values.has(normalizeHeader(column))) {
    return { ok: false, code: 'MISSING_COLUMN', message: `Missing column "${column}"` };
  }

  const raw = cellOf(row, column);
  if (raw === undefined) {
    return { ok: true, cents: null };
  }
  const cents = parseAmountToCents(raw);
  if (cents === null) {
    return { ok: false, code: 'INVALID_AMOUNT', message: `Unparseable amount "${String(raw)}"` };
  }
  return { ok: true, cents };
}

function buildDescription(row: RawRow, profile: BankProfile): string {
  const description = textOf(row, profile.columns.description) ?? '';
  const memo = textOf(row, profile.columns.memo);
  if (memo && memo !== description) {
    return description ? `${description} - ${memo}` : memo;
  }
  return description;
}

/**
 * Non-empty cell value, or undefined when the column is absent or blank
 */
function cellOf(row: RawRow, column: string | undefined): Cell | undefined {
  if (!column) return undefined;
  const value = row.values.get(normalizeHeader(column));
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.trim().length === 0) return undefined;
  return value;
}

function textOf(row: RawRow, column: string | undefined): string | undefined {
  const value = cellOf(row, column);
  return value === undefined ? undefined : String(value).trim();
}
