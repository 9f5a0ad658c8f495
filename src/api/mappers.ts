import type { Account } from '../domain/entities/Account.js';
import type { ImportRun } from '../domain/entities/ImportRun.js';
import type { Transaction } from '../domain/entities/Transaction.js';
import { formatCents } from '../domain/money.js';

export function mapAccount(account: Account) {
  return {
    id: account.id,
    name: account.name,
    institutionId: account.institutionId,
    importKey: account.importKey,
    balanceCents: account.balanceCents,
    balance: formatCents(account.balanceCents),
    createdAt: account.createdAt.toISOString(),
    updatedAt: account.updatedAt.toISOString(),
  };
}

export function mapTransaction(transaction: Transaction) {
  return {
    id: transaction.id,
    accountId: transaction.accountId,
    postedDate: transaction.postedDate,
    amountCents: transaction.amountCents,
    amount: formatCents(transaction.amountCents),
    description: transaction.description,
    category: transaction.category,
    importRunId: transaction.importRunId,
    createdAt: transaction.createdAt.toISOString(),
  };
}

export function mapImportRun(run: ImportRun) {
  return {
    id: run.id,
    sourcePath: run.sourcePath,
    profileId: run.profileId,
    accountId: run.accountId,
    stage: run.stage,
    outcome: run.outcome,
    startedAt: run.startedAt.toISOString(),
    completedAt: run.completedAt ? run.completedAt.toISOString() : null,
    counts: {
      rowsSeen: run.rowsSeen,
      rowsImported: run.rowsImported,
      rowsDuplicate: run.rowsDuplicate,
      rowsInvalid: run.rowsInvalid,
    },
    failureReason: run.failureReason,
    archivedPath: run.archivedPath,
    warnings: run.warnings,
    rowErrors: run.rowErrors,
  };
}
