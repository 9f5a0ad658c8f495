/**
 * Canonical transaction record
 * Amounts are signed integer minor units (cents); negative means debit
 */
export interface Transaction {
  id: string;
  accountId: string;
  postedDate: string; // YYYY-MM-DD
  amountCents: number;
  description: string;
  category: string | null;
  fingerprint: string;
  importRunId: string | null;
  createdAt: Date;
}

/**
 * Output of a bank profile mapper before validation and deduplication
 */
export interface TransactionDraft {
  rowNumber: number;
  postedDate: string;
  amountCents: number;
  description: string;
  category: string | null;
}

export interface DateRange {
  from?: string;
  to?: string;
}

export interface TransactionFilters {
  accountId?: string;
  dateRange?: DateRange;
  category?: string;
}

/**
 * Transaction ready to be written by a commit batch
 */
export interface PendingTransaction {
  id: string;
  postedDate: string;
  amountCents: number;
  description: string;
  category: string | null;
  fingerprint: string;
}
