import { basename } from 'node:path';
import type { ImportAccountTarget } from '../entities/Account.js';
import type { BankProfile } from '../entities/BankProfile.js';

/**
 * Picks the account a statement feeds: the first rule whose pattern matches the
 * file name, otherwise the profile's default account
 */
export function resolveAccountTarget(profile: BankProfile, sourcePath: string): ImportAccountTarget {
  const fileName = basename(sourcePath);
  const rule = profile.accountRules?.find((candidate) => new RegExp(candidate.fileNamePattern, 'i').test(fileName));
  const name = rule?.accountName ?? profile.accountName;

  return {
    institutionId: profile.institutionId,
    name,
    importKey: `${profile.institutionId}/${name.toLowerCase()}`,
  };
}
