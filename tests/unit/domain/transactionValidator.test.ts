import { describe, it, expect } from 'vitest';
import { validateDraft, type ValidationContext } from '../../../src/domain/import/transactionValidator.js';
import type { TransactionDraft } from '../../../src/domain/entities/Transaction.js';

const context: ValidationContext = {
  accountResolvable: true,
  today: '2024-03-01',
  futureDateToleranceDays: 3,
  maxAmountCents: 100_000_000,
};

function draft(overrides: Partial<TransactionDraft> = {}): TransactionDraft {
  return {
    rowNumber: 2,
    postedDate: '2024-01-05',
    amountCents: -450,
    description: 'COFFEE SHOP',
    category: null,
    ...overrides,
  };
}

function codesFor(candidate: TransactionDraft, ctx: ValidationContext = context): string[] {
  return validateDraft(candidate, ctx).map((issue) => issue.code);
}

describe('validateDraft', () => {
  it('should accept a valid draft', () => {
    expect(validateDraft(draft(), context)).toEqual([]);
  });

  it('should allow dates up to the future tolerance', () => {
    expect(codesFor(draft({ postedDate: '2024-03-04' }))).toEqual([]);
    expect(codesFor(draft({ postedDate: '2024-03-05' }))).toEqual(['DATE_IN_FUTURE']);
  });

  it('should reject impossible dates', () => {
    expect(codesFor(draft({ postedDate: '2024-02-30' }))).toEqual(['INVALID_DATE']);
  });

  it('should check the amount', () => {
    expect(codesFor(draft({ amountCents: 0 }))).toEqual(['ZERO_AMOUNT']);
    expect(codesFor(draft({ amountCents: 1.5 }))).toEqual(['INVALID_AMOUNT']);
    expect(codesFor(draft({ amountCents: -100_000_001 }))).toEqual(['AMOUNT_OUT_OF_RANGE']);
    expect(codesFor(draft({ amountCents: 100_000_000 }))).toEqual([]);
  });

  it('should reject blank descriptions', () => {
    expect(codesFor(draft({ description: '   ' }))).toEqual(['EMPTY_DESCRIPTION']);
  });

  it('should reject rows whose account cannot be resolved', () => {
    const issues = validateDraft(draft(), { ...context, accountResolvable: false });
    expect(issues).toEqual([
      {
        row: 2,
        kind: 'validation',
        code: 'ACCOUNT_UNRESOLVED',
        message: 'Account does not exist and may not be created',
      },
    ]);
  });

  it('should report every failed check', () => {
    expect(codesFor(draft({ postedDate: '2024-04-01', amountCents: 0, description: '' }))).toEqual([
      'DATE_IN_FUTURE',
      'ZERO_AMOUNT',
      'EMPTY_DESCRIPTION',
    ]);
  });
});
