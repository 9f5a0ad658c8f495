import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createImportConfig,
  importConfigFromEnv,
  loadBankProfiles,
} from '../../../src/infra/importConfig.js';
import { parseEnv } from '../../../src/infra/env.js';
import { ConfigError } from '../../../src/domain/errors.js';
import { BUILTIN_PROFILES, GENERIC_PROFILE } from '../../../src/domain/profiles/builtinProfiles.js';

describe('createImportConfig', () => {
  it('should apply defaults around the required directories', () => {
    const config = createImportConfig({ inboxDir: '/data/inbox', archiveDir: '/data/archive' });

    expect(config.accountPolicy).toBe('auto_create');
    expect(config.maxParallelFiles).toBe(4);
    expect(config.profiles.map((profile) => profile.id)).toEqual(['pnc', 'chase', 'capital_one', 'generic']);
  });

  it('should freeze the configuration and its profiles', () => {
    const config = createImportConfig({
      inboxDir: '/data/inbox',
      archiveDir: '/data/archive',
      profiles: [structuredClone(GENERIC_PROFILE)],
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.profiles[0].columns)).toBe(true);
    expect(Object.isFrozen(config.profiles[0].headerSignature)).toBe(true);
  });

  it('should reject duplicate profile ids', () => {
    expect(() =>
      createImportConfig({
        inboxDir: '/data/inbox',
        archiveDir: '/data/archive',
        profiles: [GENERIC_PROFILE, { ...GENERIC_PROFILE }],
      })
    ).toThrow(ConfigError);
  });

  it('should convert env values', () => {
    const env = parseEnv({ MAX_AMOUNT: '2500.50', ACCOUNT_POLICY: 'reject', INBOX_DIR: '/in' });
    const config = importConfigFromEnv(env, BUILTIN_PROFILES);

    expect(config.maxAmountCents).toBe(250050);
    expect(config.accountPolicy).toBe('reject');
    expect(config.inboxDir).toBe('/in');
    expect(config.archiveDir).toBe('./data/archive');
  });
});

describe('loadBankProfiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'profiles-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return the built-in profiles without a file', async () => {
    const profiles = await loadBankProfiles(undefined);
    expect(profiles.map((profile) => profile.id)).toEqual(['pnc', 'chase', 'capital_one', 'generic']);
  });

  it('should let file profiles replace built-ins with the same id', async () => {
    const path = join(dir, 'profiles.json');
    await writeFile(
      path,
      JSON.stringify({
        profiles: [
          { ...GENERIC_PROFILE, accountName: 'Main' },
          {
            id: 'credit_union',
            institutionId: 'credit_union',
            displayName: 'Credit Union',
            accountName: 'Share Draft',
            headerSignature: ['Posted', 'Memo', 'Debit', 'Credit'],
            columns: { postedDate: 'Posted', description: 'Memo', debit: 'Debit', credit: 'Credit' },
            dateFormats: ['M/D/YYYY'],
            amountConvention: { kind: 'debit_credit_columns' },
          },
        ],
      })
    );

    const profiles = await loadBankProfiles(path);

    expect(profiles.map((profile) => profile.id)).toEqual([
      'generic',
      'credit_union',
      'pnc',
      'chase',
      'capital_one',
    ]);
    expect(profiles[0].accountName).toBe('Main');
  });

  it('should load the sample profile file shipped with the project', async () => {
    const samplePath = fileURLToPath(new URL('../../../examples/bank-profiles.json', import.meta.url));

    const profiles = await loadBankProfiles(samplePath);

    expect(profiles.map((profile) => profile.id)).toEqual(['credit_union', 'pnc', 'chase', 'capital_one', 'generic']);
    expect(profiles[0].accountRules).toEqual([{ fileNamePattern: 'savings', accountName: 'Share Savings' }]);
  });

  it('should reject account rules with an invalid pattern', async () => {
    const path = join(dir, 'profiles.json');
    await writeFile(
      path,
      JSON.stringify({
        profiles: [{ ...GENERIC_PROFILE, accountRules: [{ fileNamePattern: '([', accountName: 'Broken' }] }],
      })
    );

    await expect(loadBankProfiles(path)).rejects.toThrow(`Invalid bank profile file ${path}`);
  });

  it('should reject profiles missing the columns their convention needs', async () => {
    const path = join(dir, 'profiles.json');
    await writeFile(
      path,
      JSON.stringify({
        profiles: [{ ...GENERIC_PROFILE, id: 'broken', columns: { postedDate: 'Date', description: 'Description' } }],
      })
    );

    await expect(loadBankProfiles(path)).rejects.toThrow(`Invalid bank profile file ${path}`);
  });

  it('should report unreadable files', async () => {
    const path = join(dir, 'missing.json');
    await expect(loadBankProfiles(path)).rejects.toThrow(`Could not load bank profile file ${path}`);
  });
});
