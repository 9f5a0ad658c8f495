import { readFile } from 'node:fs/promises';
import { z, ZodError } from 'zod';
import type { Env } from './env.js';
import type { AccountPolicy } from '../domain/entities/Account.js';
import { bankProfileSchema, type BankProfile } from '../domain/entities/BankProfile.js';
import { BUILTIN_PROFILES } from '../domain/profiles/builtinProfiles.js';
import { ConfigError } from '../domain/errors.js';
import { logger } from './logger.js';

/**
 * Everything the import pipeline needs, resolved once at startup
 */
export interface ImportConfig {
  readonly profiles: readonly BankProfile[];
  readonly inboxDir: string;
  readonly archiveDir: string;
  readonly accountPolicy: AccountPolicy;
  readonly maxParallelFiles: number;
  readonly fileReadTimeoutMs: number;
  readonly storageTimeoutMs: number;
  readonly archiveRetries: number;
  readonly futureDateToleranceDays: number;
  readonly maxAmountCents: number;
}

export const DEFAULT_IMPORT_CONFIG: Omit<ImportConfig, 'inboxDir' | 'archiveDir'> = {
  profiles: BUILTIN_PROFILES,
  accountPolicy: 'auto_create',
  maxParallelFiles: 4,
  fileReadTimeoutMs: 10_000,
  storageTimeoutMs: 5_000,
  archiveRetries: 2,
  futureDateToleranceDays: 3,
  maxAmountCents: 100_000_000,
};

/**
 * Builds a frozen configuration; profiles are deep-frozen so nothing can mutate them at runtime
 */
export function createImportConfig(
  params: Partial<ImportConfig> & Pick<ImportConfig, 'inboxDir' | 'archiveDir'>
): ImportConfig {
  const config: ImportConfig = { ...DEFAULT_IMPORT_CONFIG, ...params };
  const ids = new Set<string>();
  for (const profile of config.profiles) {
    if (ids.has(profile.id)) {
      throw new ConfigError(`Duplicate bank profile id: ${profile.id}`);
    }
    ids.add(profile.id);
  }
  return Object.freeze({
    ...config,
    profiles: Object.freeze(config.profiles.map(deepFreeze)),
  });
}

export function importConfigFromEnv(env: Env, profiles: readonly BankProfile[]): ImportConfig {
  return createImportConfig({
    profiles,
    inboxDir: env.INBOX_DIR,
    archiveDir: env.ARCHIVE_DIR,
    accountPolicy: env.ACCOUNT_POLICY,
    maxParallelFiles: env.MAX_PARALLEL_FILES,
    fileReadTimeoutMs: env.FILE_READ_TIMEOUT_MS,
    storageTimeoutMs: env.STORAGE_TIMEOUT_MS,
    archiveRetries: env.ARCHIVE_RETRIES,
    futureDateToleranceDays: env.FUTURE_DATE_TOLERANCE_DAYS,
    maxAmountCents: Math.round(env.MAX_AMOUNT * 100),
  });
}

const profileFileSchema = z.object({ profiles: z.array(bankProfileSchema) });

/**
 * Built-in profiles plus any declared in a JSON file; file entries replace built-ins with the same id
 */
export async function loadBankProfiles(path?: string): Promise<BankProfile[]> {
  if (!path) {
    return [...BUILTIN_PROFILES];
  }

  let parsed: z.infer<typeof profileFileSchema>;
  try {
    const content = await readFile(path, 'utf-8');
    parsed = profileFileSchema.parse(JSON.parse(content));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid bank profile file ${path}`, {
        issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    throw new ConfigError(`Could not load bank profile file ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const overridden = new Set(parsed.profiles.map((profile) => profile.id));
  const profiles = [...parsed.profiles, ...BUILTIN_PROFILES.filter((p) => !overridden.has(p.id))];
  logger.info('Bank profiles loaded', { path, profileIds: profiles.map((profile) => profile.id) });
  return profiles;
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
