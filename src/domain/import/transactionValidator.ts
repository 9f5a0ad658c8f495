import type { TransactionDraft } from '../entities/Transaction.js';
import type { RowError } from '../entities/ImportRun.js';
import { addDays, isIsoDate, todayIsoDate } from '../dates.js';
import { formatCents } from '../money.js';

export interface ValidationContext {
  /** The file's account exists, or policy allows creating it */
  accountResolvable: boolean;
  today?: string;
  futureDateToleranceDays: number;
  maxAmountCents: number;
}

/**
 * Checks a mapped draft before it may be persisted
 * Every failed check yields its own issue; an empty list means the draft is valid.
 */
export function validateDraft(draft: TransactionDraft, ctx: ValidationContext): RowError[] {
  const issues: RowError[] = [];
  const issue = (code: RowError['code'], message: string): void => {
    issues.push({ row: draft.rowNumber, kind: 'validation', code, message });
  };

  const today = ctx.today ?? todayIsoDate();
  const latestAllowed = addDays(today, ctx.futureDateToleranceDays);

  if (!isIsoDate(draft.postedDate)) {
    issue('INVALID_DATE', `"${draft.postedDate}" is not a calendar date`);
  } else if (draft.postedDate > latestAllowed) {
    issue('DATE_IN_FUTURE', `Posted date ${draft.postedDate} is after ${latestAllowed}`);
  }

  if (!Number.isSafeInteger(draft.amountCents)) {
    issue('INVALID_AMOUNT', 'Amount is not a whole number of cents');
  } else if (draft.amountCents === 0) {
    issue('ZERO_AMOUNT', 'Amount is zero');
  } else if (Math.abs(draft.amountCents) > ctx.maxAmountCents) {
    issue(
      'AMOUNT_OUT_OF_RANGE',
      `Amount ${formatCents(draft.amountCents)} exceeds ${formatCents(ctx.maxAmountCents)}`
    );
  }

  if (draft.description.trim().length === 0) {
    issue('EMPTY_DESCRIPTION', 'Description is empty');
  }

  if (!ctx.accountResolvable) {
    issue('ACCOUNT_UNRESOLVED', 'Account does not exist and may not be created');
  }

  return issues;
}
