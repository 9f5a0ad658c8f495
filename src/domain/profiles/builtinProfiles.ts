import type { BankProfile } from '../entities/BankProfile.js';

export const GENERIC_PROFILE: BankProfile = {
  id: 'generic',
  institutionId: 'generic',
  displayName: 'Generic CSV',
  accountName: 'Default',
  headerSignature: ['Date', 'Description', 'Amount'],
  columns: {
    postedDate: 'Date',
    description: 'Description',
    amount: 'Amount',
    category: 'Category',
  },
  dateFormats: ['YYYY-MM-DD', 'MM/DD/YYYY'],
  amountConvention: { kind: 'signed' },
};

export const PNC_PROFILE: BankProfile = {
  id: 'pnc',
  institutionId: 'pnc',
  displayName: 'PNC',
  accountName: 'PNC Checking',
  headerSignature: ['Date', 'Description', 'Withdrawals', 'Deposits', 'Category', 'Balance'],
  columns: {
    postedDate: 'Date',
    description: 'Description',
    debit: 'Withdrawals',
    credit: 'Deposits',
    category: 'Category',
  },
  dateFormats: ['MM/DD/YYYY', 'YYYY-MM-DD'],
  amountConvention: { kind: 'debit_credit_columns' },
};

export const CHASE_PROFILE: BankProfile = {
  id: 'chase',
  institutionId: 'chase',
  displayName: 'Chase',
  accountName: 'Chase Card',
  accountRules: [{ fileNamePattern: 'star[ _-]?wars', accountName: 'Chase Star Wars Card' }],
  headerSignature: ['Transaction Date', 'Post Date', 'Description', 'Category', 'Type', 'Amount'],
  columns: {
    postedDate: 'Transaction Date',
    description: 'Description',
    amount: 'Amount',
    type: 'Type',
    category: 'Category',
    memo: 'Memo',
  },
  dateFormats: ['MM/DD/YYYY', 'YYYY-MM-DD'],
  amountConvention: { kind: 'type_column', debitTypes: ['Sale', 'Payment', 'Fee'] },
};

export const CAPITAL_ONE_PROFILE: BankProfile = {
  id: 'capital_one',
  institutionId: 'capital_one',
  displayName: 'Capital One',
  accountName: 'Capital One',
  headerSignature: [
    'Transaction Date',
    'Posted Date',
    'Card No.',
    'Description',
    'Category',
    'Debit',
    'Credit',
  ],
  columns: {
    postedDate: 'Transaction Date',
    description: 'Description',
    debit: 'Debit',
    credit: 'Credit',
    category: 'Category',
  },
  dateFormats: ['YYYY-MM-DD', 'MM/DD/YYYY'],
  amountConvention: { kind: 'debit_credit_columns' },
};

/**
 * Registration order matters only for signatures of equal specificity
 */
export const BUILTIN_PROFILES: readonly BankProfile[] = [
  PNC_PROFILE,
  CHASE_PROFILE,
  CAPITAL_ONE_PROFILE,
  GENERIC_PROFILE,
];
