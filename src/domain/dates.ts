import type { DateFormat } from './entities/BankProfile.js';

type DatePart = 'y' | 'm' | 'd';

const FORMAT_PATTERNS: Record<DateFormat, { pattern: RegExp; order: [DatePart, DatePart, DatePart] }> = {
  'YYYY-MM-DD': { pattern: /^(\d{4})-(\d{2})-(\d{2})$/, order: ['y', 'm', 'd'] },
  'MM/DD/YYYY': { pattern: /^(\d{2})\/(\d{2})\/(\d{4})$/, order: ['m', 'd', 'y'] },
  'M/D/YYYY': { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['m', 'd', 'y'] },
  'DD/MM/YYYY': { pattern: /^(\d{2})\/(\d{2})\/(\d{4})$/, order: ['d', 'm', 'y'] },
};

// Days between 1899-12-30 (spreadsheet epoch) and 1970-01-01
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;
// 9999-12-31, the last date a spreadsheet can hold
const MAX_EXCEL_SERIAL = 2_958_465;

/**
 * Parses a posted date into YYYY-MM-DD using the first matching format
 * Numbers are treated as spreadsheet serial dates. Returns null when nothing
 * matches or the match is not a real calendar date (e.g. 02/30/2024).
 */
export function parsePostedDate(raw: string | number, formats: readonly DateFormat[]): string | null {
  if (typeof raw === 'number') {
    return excelSerialToIsoDate(raw);
  }

  const text = raw.trim();
  for (const format of formats) {
    const { pattern, order } = FORMAT_PATTERNS[format];
    const match = pattern.exec(text);
    if (!match) continue;

    const parts = { y: 0, m: 0, d: 0 };
    order.forEach((key, index) => {
      parts[key] = Number(match[index + 1]);
    });

    if (isCalendarDate(parts.y, parts.m, parts.d)) {
      return toIsoDate(parts.y, parts.m, parts.d);
    }
  }
  return null;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (year < 1900 || month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  return match !== null && isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  return new Date(date.getTime() + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Calendar day of an instant in UTC; validation and the archive layout both use this clock
 */
export function todayIsoDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function excelSerialToIsoDate(serial: number): string | null {
  if (!Number.isFinite(serial) || serial <= 0 || serial > MAX_EXCEL_SERIAL) return null;
  const utcDays = Math.floor(serial) - EXCEL_EPOCH_OFFSET_DAYS;
  const date = new Date(utcDays * MS_PER_DAY);
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() < 1900) return null;
  return date.toISOString().slice(0, 10);
}

function toIsoDate(year: number, month: number, day: number): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
