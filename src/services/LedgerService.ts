import { randomUUID } from 'node:crypto';
import Papa from 'papaparse';
import {
  createAccount,
  type Account,
  type AccountUpdate,
  type NewAccountInput,
} from '../domain/entities/Account.js';
import type { Transaction, TransactionFilters } from '../domain/entities/Transaction.js';
import { ConflictError, NotFoundError, ValidationError } from '../domain/errors.js';
import { isIsoDate } from '../domain/dates.js';
import { formatCents } from '../domain/money.js';
import type { AccountRepository } from '../infra/repositories/AccountRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { LedgerStore } from '../infra/LedgerStore.js';
import { logger } from '../infra/logger.js';

export const EXPORT_COLUMNS = ['Date', 'Account', 'Description', 'Amount', 'Category'] as const;

/**
 * LedgerService - account management and read/maintenance operations over imported transactions
 */
export class LedgerService {
  constructor(
    private accountRepo: AccountRepository,
    private transactionRepo: TransactionRepository,
    private ledgerStore: LedgerStore
  ) {}

  listAccounts(): Account[] {
    return this.accountRepo.list();
  }

  getAccount(accountId: string): Account {
    const account = this.accountRepo.getById(accountId);
    if (!account) {
      throw new NotFoundError('Account', accountId);
    }
    return account;
  }

  createAccount(input: NewAccountInput): Account {
    const name = input.name.trim();
    const institutionId = input.institutionId.trim();
    if (!name || !institutionId) {
      throw new ValidationError('Account name and institutionId are required');
    }
    this.assertNameFree(institutionId, name, null);

    const account = createAccount({ id: randomUUID(), name, institutionId });
    this.accountRepo.create(account);
    logger.info('Account created', { accountId: account.id, institutionId });
    return account;
  }

  updateAccount(accountId: string, changes: AccountUpdate): Account {
    const current = this.getAccount(accountId);
    const name = changes.name?.trim();
    const institutionId = changes.institutionId?.trim();
    if (name === '' || institutionId === '') {
      throw new ValidationError('Account name and institutionId cannot be empty');
    }

    this.assertNameFree(institutionId ?? current.institutionId, name ?? current.name, accountId);
    this.accountRepo.update(accountId, { name, institutionId }, new Date());
    logger.info('Account updated', { accountId });
    return this.getAccount(accountId);
  }

  async deleteAccount(accountId: string): Promise<void> {
    await this.ledgerStore.deleteAccount(accountId);
    logger.info('Account deleted', { accountId });
  }

  listTransactions(filters: TransactionFilters = {}): Transaction[] {
    assertValidFilters(filters);
    return this.transactionRepo.list(filters);
  }

  updateCategory(transactionId: string, category: string | null): void {
    const normalized = category === null ? null : category.trim() || null;
    const changes = this.transactionRepo.updateCategory(transactionId, normalized);
    if (changes === 0) {
      throw new NotFoundError('Transaction', transactionId);
    }
  }

  deleteAllTransactions(): void {
    const removed = this.ledgerStore.deleteAllTransactions();
    logger.warn('All transactions deleted', { removed });
  }

  /**
   * CSV of the filtered transactions, newest first
   */
  exportTransactions(filters: TransactionFilters = {}): Buffer {
    const transactions = this.listTransactions(filters);
    const accountNames = new Map(this.accountRepo.list().map((account) => [account.id, account.name]));

    const csv = Papa.unparse({
      fields: [...EXPORT_COLUMNS],
      data: transactions.map((transaction) => [
        transaction.postedDate,
        accountNames.get(transaction.accountId) ?? transaction.accountId,
        transaction.description,
        formatCents(transaction.amountCents),
        transaction.category ?? '',
      ]),
    });

    return Buffer.from(`${csv}\r\n`, 'utf-8');
  }

  private assertNameFree(institutionId: string, name: string, accountId: string | null): void {
    const existing = this.accountRepo.findByInstitutionAndName(institutionId, name);
    if (existing && existing.id !== accountId) {
      throw new ConflictError(`Account "${name}" already exists for ${institutionId}`, {
        accountId: existing.id,
      });
    }
  }
}

function assertValidFilters(filters: TransactionFilters): void {
  const { from, to } = filters.dateRange ?? {};
  if (from !== undefined && !isIsoDate(from)) {
    throw new ValidationError('dateRange.from must be YYYY-MM-DD', { from });
  }
  if (to !== undefined && !isIsoDate(to)) {
    throw new ValidationError('dateRange.to must be YYYY-MM-DD', { to });
  }
  if (from && to && from > to) {
    throw new ValidationError('dateRange.from must not be after dateRange.to', { from, to });
  }
}
