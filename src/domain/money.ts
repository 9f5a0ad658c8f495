/**
 * Fixed-point currency helpers. All amounts are integer cents.
 */

const CURRENCY_NOISE = /[$€£¥\s,]|USD|EUR|GBP/gi;
const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d{0,2}))?$/;

/**
 * Parses a bank-formatted amount into signed cents
 * Accepts currency symbols, thousands separators and accounting parentheses.
 * Returns null for anything that is not an amount with at most two decimals.
 */
export function parseAmountToCents(raw: string | number): number | null {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return null;
    const scaled = raw * 100;
    const cents = Math.round(scaled);
    return Math.abs(scaled - cents) < 1e-6 ? normalizeZero(cents) : null;
  }

  let text = raw.trim();
  if (text.length === 0) return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  text = text.replace(CURRENCY_NOISE, '');
  // "$-4.50" leaves the sign after the symbol; "-$4.50" leaves it in front
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  if (sign === '-') negative = !negative;

  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(cents)) return null;
  return normalizeZero(negative ? -cents : cents);
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function sumCents(amounts: number[]): number {
  return amounts.reduce((total, amount) => total + amount, 0);
}

function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}
