import type { TransactionDraft } from '../domain/entities/Transaction.js';
import type { RowError } from '../domain/entities/ImportRun.js';
import { computeFingerprint } from '../domain/import/fingerprint.js';

export interface FingerprintedDraft extends TransactionDraft {
  fingerprint: string;
}

export interface FingerprintSource {
  fingerprintsFor(accountId: string): Set<string>;
}

/**
 * DuplicateDetector - splits validated drafts into new rows and duplicates
 * A draft is a duplicate when its fingerprint is already stored for the account
 * or appeared earlier in the same file; the first occurrence survives.
 */
export class DuplicateDetector {
  constructor(private source: FingerprintSource) {}

  partition(
    accountId: string,
    drafts: TransactionDraft[]
  ): { unique: FingerprintedDraft[]; duplicates: RowError[] } {
    const seen = this.source.fingerprintsFor(accountId);
    const unique: FingerprintedDraft[] = [];
    const duplicates: RowError[] = [];

    for (const draft of drafts) {
      const fingerprint = computeFingerprint({ accountId, ...draft });
      if (seen.has(fingerprint)) {
        duplicates.push({
          row: draft.rowNumber,
          kind: 'duplicate',
          code: 'DUPLICATE',
          message: `Duplicate of an existing transaction (${draft.postedDate}, ${draft.description.trim()})`,
        });
        continue;
      }
      seen.add(fingerprint);
      unique.push({ ...draft, fingerprint });
    }

    return { unique, duplicates };
  }
}
