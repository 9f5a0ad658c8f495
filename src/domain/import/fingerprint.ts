import { createHash } from 'node:crypto';

/**
 * Lowercase, punctuation to spaces, collapsed whitespace
 */
export function normalizeDescription(description: string): string {
  return description
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Stable duplicate-detection key for one transaction of one account
 * Built from canonical values, so column order and whitespace in the export do not matter.
 */
export function computeFingerprint(params: {
  accountId: string;
  postedDate: string;
  amountCents: number;
  description: string;
}): string {
  const signature = [
    params.accountId,
    params.postedDate,
    String(params.amountCents),
    normalizeDescription(params.description),
  ].join('|');
  return createHash('sha256').update(signature).digest('hex');
}
