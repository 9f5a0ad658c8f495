import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import * as XLSX from 'xlsx';
import { createHarness, csv, type Harness } from '../helpers/harness.js';
import { TransactionRepository } from '../../src/infra/repositories/TransactionRepository.js';
import { FileArchiver } from '../../src/infra/FileArchiver.js';
import { ArchiveError } from '../../src/domain/errors.js';

class FailingTransactionRepository extends TransactionRepository {
  private inserts = 0;

  override insert(params: Parameters<TransactionRepository['insert']>[0]): void {
    this.inserts += 1;
    if (this.inserts === 2) {
      throw new Error('disk full');
    }
    super.insert(params);
  }
}

class UnavailableArchiver extends FileArchiver {
  override async archive(sourcePath: string): Promise<string> {
    throw new ArchiveError(`Could not archive ${basename(sourcePath)}`);
  }
}

describe('Statement import pipeline', () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  it('should import a repeated row once and move the balance by its amount', async () => {
    h = await createHarness();
    const path = await h.writeStatement(
      'coffee.csv',
      csv('2024-01-05,COFFEE SHOP,-4.50,', '2024-01-05,COFFEE SHOP,-4.50,')
    );

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('succeeded');
    expect(run.stage).toBe('done');
    expect(run.profileId).toBe('generic');
    expect(run.rowsSeen).toBe(2);
    expect(run.rowsImported).toBe(1);
    expect(run.rowsDuplicate).toBe(1);
    expect(run.rowsInvalid).toBe(0);
    expect(run.rowErrors).toEqual([
      {
        row: 3,
        kind: 'duplicate',
        code: 'DUPLICATE',
        message: 'Duplicate of an existing transaction (2024-01-05, COFFEE SHOP)',
      },
    ]);

    const [account] = h.ledgerService.listAccounts();
    expect(account.name).toBe('Default');
    expect(account.institutionId).toBe('generic');
    expect(account.balanceCents).toBe(-450);
    expect(run.accountId).toBe(account.id);

    expect(existsSync(path)).toBe(false);
    expect(run.archivedPath).not.toBeNull();
    expect(run.archivedPath?.startsWith(h.archiveDir)).toBe(true);
  });

  it('should be idempotent when the archived copy is imported again', async () => {
    h = await createHarness();
    const path = await h.writeStatement(
      'coffee.csv',
      csv('2024-01-05,COFFEE SHOP,-4.50,', '2024-01-06,BAKERY,-3.00,')
    );
    const [first] = await h.importService.importFiles([path]);

    const [second] = await h.importService.importFiles([first.archivedPath ?? '']);

    expect(second.outcome).toBe('succeeded');
    expect(second.rowsImported).toBe(0);
    expect(second.rowsDuplicate).toBe(2);
    expect(h.ledgerService.listTransactions()).toHaveLength(2);
    expect(h.ledgerService.listAccounts()[0].balanceCents).toBe(-750);
  });

  it('should fail a run whose file is already gone', async () => {
    h = await createHarness();
    const path = await h.writeStatement('coffee.csv', csv('2024-01-05,COFFEE SHOP,-4.50,'));
    await h.importService.importFiles([path]);

    const [again] = await h.importService.importFiles([path]);

    expect(again.outcome).toBe('failed');
    expect(again.stage).toBe('failed');
    expect(again.failureReason).toBe('detecting: Could not read coffee.csv');
    expect(again.rowsImported).toBe(0);
  });

  it('should count bad rows without affecting valid ones', async () => {
    h = await createHarness();
    const path = await h.writeStatement(
      'mixed.csv',
      csv(
        '2024-01-05,COFFEE SHOP,-4.50,Dining',
        'not-a-date,BAD DATE,-1.00,',
        '2024-01-06,BAD AMOUNT,abc,',
        '2024-01-07,"PAYCHECK, ACME",1000.00,'
      )
    );

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('partially_succeeded');
    expect(run.rowsSeen).toBe(4);
    expect(run.rowsInvalid).toBe(2);
    expect(run.rowsImported).toBe(2);
    expect(run.rowErrors.map((issue) => [issue.row, issue.kind, issue.code])).toEqual([
      [3, 'mapping', 'INVALID_DATE'],
      [4, 'mapping', 'INVALID_AMOUNT'],
    ]);
    expect(h.ledgerService.listAccounts()[0].balanceCents).toBe(99550);
  });

  it('should leave no rows and the old balance when a storage write fails', async () => {
    h = await createHarness({ transactionRepo: (db) => new FailingTransactionRepository(db) });
    const path = await h.writeStatement(
      'three.csv',
      csv('2024-01-05,COFFEE SHOP,-4.50,', '2024-01-06,BAKERY,-3.00,', '2024-01-07,LUNCH,-12.00,')
    );

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('failed');
    expect(run.failureReason).toBe('persisting: Transaction failed');
    expect(run.rowsImported).toBe(0);
    expect(h.ledgerService.listTransactions()).toEqual([]);
    expect(h.ledgerService.listAccounts()[0].balanceCents).toBe(0);
    expect(existsSync(path)).toBe(true);
  });

  it.each([[['a.csv', 'b.csv']], [['b.csv', 'a.csv']]])(
    'should store a transaction shared by two files once (order %j)',
    async (order) => {
      h = await createHarness({ config: { maxParallelFiles: 2 } });
      const files = new Map([
        ['a.csv', csv('2024-01-05,COFFEE SHOP,-4.50,', '2024-01-06,BAKERY,-3.00,')],
        ['b.csv', csv('2024-01-06,BAKERY,-3.00,', '2024-01-07,LUNCH,-12.00,')],
      ]);
      const paths: string[] = [];
      for (const name of order) {
        paths.push(await h.writeStatement(name, files.get(name) ?? ''));
      }

      const runs = await h.importService.importFiles(paths);

      expect(runs.map((run) => basename(run.sourcePath))).toEqual(order);
      expect(runs.every((run) => run.outcome === 'succeeded')).toBe(true);
      expect(runs.reduce((total, run) => total + run.rowsImported, 0)).toBe(3);
      expect(runs.reduce((total, run) => total + run.rowsDuplicate, 0)).toBe(1);
      expect(h.ledgerService.listTransactions()).toHaveLength(3);
      expect(h.ledgerService.listAccounts()).toHaveLength(1);
      expect(h.ledgerService.listAccounts()[0].balanceCents).toBe(-1950);
    }
  );

  it('should reject rows for unknown accounts under the reject policy', async () => {
    h = await createHarness({ config: { accountPolicy: 'reject' } });
    const path = await h.writeStatement(
      'coffee.csv',
      csv('2024-01-05,COFFEE SHOP,-4.50,', '2024-01-06,BAKERY,-3.00,')
    );

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('partially_succeeded');
    expect(run.rowsInvalid).toBe(2);
    expect(run.rowsImported).toBe(0);
    expect(run.rowErrors.map((issue) => issue.code)).toEqual(['ACCOUNT_UNRESOLVED', 'ACCOUNT_UNRESOLVED']);
    expect(h.ledgerService.listAccounts()).toEqual([]);
  });

  it('should import into an existing account under the reject policy', async () => {
    h = await createHarness({ config: { accountPolicy: 'reject' } });
    const account = h.ledgerService.createAccount({ name: 'Default', institutionId: 'generic' });
    const path = await h.writeStatement('coffee.csv', csv('2024-01-05,COFFEE SHOP,-4.50,'));

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('succeeded');
    expect(run.accountId).toBe(account.id);
    expect(h.ledgerService.getAccount(account.id).balanceCents).toBe(-450);
  });

  it('should stay idempotent after the imported account is renamed', async () => {
    h = await createHarness();
    const content = csv('2024-01-05,COFFEE SHOP,-4.50,');
    const [first] = await h.importService.importFiles([await h.writeStatement('coffee.csv', content)]);
    h.ledgerService.updateAccount(first.accountId ?? '', { name: 'My everyday account' });

    const [second] = await h.importService.importFiles([await h.writeStatement('coffee.csv', content)]);

    expect(second.accountId).toBe(first.accountId);
    expect(second.rowsImported).toBe(0);
    expect(second.rowsDuplicate).toBe(1);
    expect(h.ledgerService.listAccounts().map((account) => [account.name, account.balanceCents])).toEqual([
      ['My everyday account', -450],
    ]);
    expect(h.ledgerService.listTransactions()).toHaveLength(1);
  });

  it('should keep two cards of the same bank apart by file name', async () => {
    h = await createHarness();
    const content = [
      'Transaction Date,Post Date,Description,Category,Type,Amount,Memo',
      '01/05/2024,01/06/2024,COFFEE SHOP,Food & Drink,Sale,-4.50,',
    ].join('\n');
    const everyday = await h.writeStatement('chase_2024_01.csv', content);
    const starWars = await h.writeStatement('chase_star_wars_2024_01.csv', content);

    const runs = await h.importService.importFiles([everyday, starWars]);

    expect(runs.map((run) => run.rowsImported)).toEqual([1, 1]);
    expect(h.ledgerService.listAccounts().map((account) => [account.name, account.balanceCents])).toEqual([
      ['Chase Card', -450],
      ['Chase Star Wars Card', -450],
    ]);
  });

  it('should reject only the spreadsheet row whose date is out of range', async () => {
    h = await createHarness();
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Date', 'Description', 'Amount'],
        [45296, 'COFFEE SHOP', -4.5],
        [1e9, 'BAD DATE', -1],
      ]),
      'Transactions'
    );
    const path = join(h.inboxDir, 'statement.xlsx');
    await writeFile(path, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('partially_succeeded');
    expect(run.rowsImported).toBe(1);
    expect(run.rowsInvalid).toBe(1);
    expect(run.rowErrors).toEqual([
      { row: 3, kind: 'mapping', code: 'INVALID_DATE', message: 'Unparseable date "1000000000"' },
    ]);
    expect(h.ledgerService.listTransactions().map((transaction) => transaction.postedDate)).toEqual(['2024-01-05']);
  });

  it('should fail unrecognized layouts', async () => {
    h = await createHarness();
    const path = await h.writeStatement('odd.csv', 'foo,bar\n1,2\n');

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('failed');
    expect(run.failureReason).toBe('detecting: Unrecognized statement format: odd.csv');
    expect(run.profileId).toBeNull();
    expect(existsSync(path)).toBe(true);
  });

  it('should fail every file of a canceled batch without touching them', async () => {
    h = await createHarness();
    const first = await h.writeStatement('a.csv', csv('2024-01-05,COFFEE SHOP,-4.50,'));
    const second = await h.writeStatement('b.csv', csv('2024-01-06,BAKERY,-3.00,'));
    const controller = new AbortController();
    controller.abort();

    const runs = await h.importService.importFiles([first, second], { signal: controller.signal });

    expect(runs.map((run) => run.failureReason)).toEqual([
      'detecting: Import canceled',
      'detecting: Import canceled',
    ]);
    expect(h.ledgerService.listTransactions()).toEqual([]);
    expect(existsSync(first)).toBe(true);
    expect(existsSync(second)).toBe(true);
  });

  it('should keep committed rows and warn when archiving fails', async () => {
    h = await createHarness({ archiver: (dir) => new UnavailableArchiver(dir) });
    const path = await h.writeStatement('coffee.csv', csv('2024-01-05,COFFEE SHOP,-4.50,'));

    const [run] = await h.importService.importFiles([path]);

    expect(run.outcome).toBe('partially_succeeded');
    expect(run.rowsImported).toBe(1);
    expect(run.archivedPath).toBeNull();
    expect(run.warnings).toEqual(['Imported but not archived: Could not archive coffee.csv']);
    expect(existsSync(path)).toBe(true);
  });

  it('should read debit/credit statements with metadata rows', async () => {
    h = await createHarness();
    const path = await h.writeStatement(
      'pnc.csv',
      [
        'Account Number: ****1234',
        'Date,Description,Withdrawals,Deposits,Category,Balance',
        '01/05/2024,RENT,"1,200.00",,Housing,800.00',
        '01/06/2024,PAYROLL,,"1,500.00",Income,2300.00',
      ].join('\n')
    );

    const [run] = await h.importService.importFiles([path]);

    expect(run.profileId).toBe('pnc');
    expect(run.rowsImported).toBe(2);
    const [account] = h.ledgerService.listAccounts();
    expect(account.name).toBe('PNC Checking');
    expect(account.balanceCents).toBe(30000);
    expect(h.ledgerService.listTransactions().map((transaction) => transaction.category)).toEqual([
      'Income',
      'Housing',
    ]);
  });

  it('should reject an empty batch', async () => {
    h = await createHarness();
    await expect(h.importService.importFiles([])).rejects.toThrow('At least one file path is required');
    expect(existsSync(join(h.root, 'ledger.db'))).toBe(true);
  });
});
