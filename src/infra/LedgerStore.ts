import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from './DatabaseAdapter.js';
import type { AccountRepository } from './repositories/AccountRepository.js';
import type { TransactionRepository } from './repositories/TransactionRepository.js';
import { KeyedLock } from './KeyedLock.js';
import { createAccount, type Account, type ImportAccountTarget } from '../domain/entities/Account.js';
import type { PendingTransaction } from '../domain/entities/Transaction.js';
import { ImportCanceledError, NotFoundError } from '../domain/errors.js';
import { sumCents } from '../domain/money.js';
import { logger } from './logger.js';

export interface CommitBatchResult {
  inserted: PendingTransaction[];
  /** Fingerprints already present when the batch ran (committed by another file meanwhile) */
  skippedFingerprints: string[];
  balanceCents: number;
}

/**
 * LedgerStore - atomic write paths over accounts and transactions
 * Writes touching one account are serialized by a per-account lock; each write
 * runs in a single SQLite transaction so it applies fully or not at all.
 */
export class LedgerStore {
  private accountLock = new KeyedLock();

  constructor(
    private db: DatabaseAdapter,
    private accountRepo: AccountRepository,
    private transactionRepo: TransactionRepository,
    private lockTimeoutMs: number
  ) {}

  /**
   * Inserts a file's surviving transactions and moves the cached balance by their sum
   */
  async commitBatch(params: {
    accountId: string;
    importRunId: string | null;
    transactions: PendingTransaction[];
    signal?: AbortSignal;
  }): Promise<CommitBatchResult> {
    return this.accountLock.runExclusive(params.accountId, this.lockTimeoutMs, () => {
      // A cancellation that arrives while waiting for the lock wins; once the
      // synchronous transaction starts it runs to completion or rolls back
      if (params.signal?.aborted) {
        throw new ImportCanceledError();
      }
      return this.db.transaction(() => this.applyBatch(params));
    });
  }

  fingerprintsFor(accountId: string): Set<string> {
    return this.transactionRepo.listFingerprints(accountId);
  }

  /**
   * The account an import target resolves to without creating anything:
   * the account holding its import key, else a hand-made account with the target's name
   */
  resolveImportAccount(target: ImportAccountTarget): Account | null {
    const keyed = this.accountRepo.findByImportKey(target.importKey);
    if (keyed) {
      return keyed;
    }
    const named = this.accountRepo.findByInstitutionAndName(target.institutionId, target.name);
    return named && named.importKey === null ? named : null;
  }

  /**
   * Returns the target's account, adopting a matching hand-made account or creating an empty one
   * Display names may change afterwards; the import key keeps pointing at the same account.
   */
  findOrCreateAccount(target: ImportAccountTarget): { account: Account; created: boolean } {
    return this.db.transaction(() => {
      const existing = this.resolveImportAccount(target);
      if (existing && existing.importKey === null) {
        const now = new Date();
        this.accountRepo.assignImportKey(existing.id, target.importKey, now);
        logger.info('Account linked to import key', { accountId: existing.id, importKey: target.importKey });
        return { account: { ...existing, importKey: target.importKey, updatedAt: now }, created: false };
      }
      if (existing) {
        return { account: existing, created: false };
      }

      const name = this.freeAccountName(target.institutionId, target.name);
      const account = createAccount({
        id: randomUUID(),
        institutionId: target.institutionId,
        name,
        importKey: target.importKey,
      });
      this.accountRepo.create(account);
      logger.info('Account auto-created for import', {
        accountId: account.id,
        institutionId: target.institutionId,
        name,
      });
      return { account, created: true };
    });
  }

  /**
   * Deletes an account and, by cascade, its transactions
   */
  async deleteAccount(accountId: string): Promise<void> {
    await this.accountLock.runExclusive(accountId, this.lockTimeoutMs, () => {
      const removed = this.accountRepo.delete(accountId);
      if (removed === 0) {
        throw new NotFoundError('Account', accountId);
      }
    });
  }

  /**
   * Clears every transaction and zeroes all cached balances in one transaction
   */
  deleteAllTransactions(): number {
    return this.db.transaction(() => {
      const removed = this.transactionRepo.deleteAll();
      this.accountRepo.resetAllBalances(new Date());
      return removed;
    });
  }

  /**
   * "Default", or "Default (2)", "Default (3)", ... when another import owns the name
   */
  private freeAccountName(institutionId: string, name: string): string {
    let candidate = name;
    for (let n = 2; this.accountRepo.findByInstitutionAndName(institutionId, candidate); n++) {
      candidate = `${name} (${n})`;
    }
    return candidate;
  }

  private applyBatch(params: {
    accountId: string;
    importRunId: string | null;
    transactions: PendingTransaction[];
  }): CommitBatchResult {
    const account = this.accountRepo.getById(params.accountId);
    if (!account) {
      throw new NotFoundError('Account', params.accountId);
    }

    const now = new Date();
    const inserted: PendingTransaction[] = [];
    const skippedFingerprints: string[] = [];

    for (const transaction of params.transactions) {
      if (this.transactionRepo.hasFingerprint(params.accountId, transaction.fingerprint)) {
        skippedFingerprints.push(transaction.fingerprint);
        continue;
      }
      this.transactionRepo.insert({
        accountId: params.accountId,
        importRunId: params.importRunId,
        transaction,
        createdAt: now,
      });
      inserted.push(transaction);
    }

    const delta = sumCents(inserted.map((transaction) => transaction.amountCents));
    if (delta !== 0) {
      this.accountRepo.adjustBalance(params.accountId, delta, now);
    }

    logger.debug('Commit batch applied', {
      accountId: params.accountId,
      inserted: inserted.length,
      skipped: skippedFingerprints.length,
    });

    return { inserted, skippedFingerprints, balanceCents: account.balanceCents + delta };
  }
}
