/**
 * Account entity - a bank account that imported transactions belong to
 * balanceCents is a cache of the sum of the account's transactions and is only
 * changed by the persistence layer's commit batch.
 * importKey ties the account to the statements that feed it; it is set once and
 * survives renames. Accounts created by hand have none until an import adopts them.
 */
export interface Account {
  id: string;
  name: string;
  institutionId: string;
  importKey: string | null;
  balanceCents: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewAccountInput {
  name: string;
  institutionId: string;
}

export interface AccountUpdate {
  name?: string;
  institutionId?: string;
}

export function createAccount(params: { id: string; importKey?: string } & NewAccountInput): Account {
  const now = new Date();
  return {
    id: params.id,
    name: params.name.trim(),
    institutionId: params.institutionId.trim(),
    importKey: params.importKey ?? null,
    balanceCents: 0,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * How the importer treats rows whose profile points at an account that does not exist yet
 */
export type AccountPolicy = 'auto_create' | 'reject';

/**
 * The account a statement file feeds, as derived from its profile and file name
 */
export interface ImportAccountTarget {
  institutionId: string;
  name: string;
  importKey: string;
}
