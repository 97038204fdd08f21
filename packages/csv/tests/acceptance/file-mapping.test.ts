import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { defineRecord, field, isRowbindError } from '@rowbind/core';
import type { InferRecord } from '@rowbind/core';
import { readToRecords, writeFromRecords } from '../../src/fileMapping.js';

const Account = defineRecord('Account', {
  id: field.int64('id'),
  owner: field.string('owner'),
  balance: field.float64('balance'),
  verified: field.bool('verified'),
  notes: field.string(),
});

type Account = InferRecord<typeof Account>;

describe('File mapping', () => {
  const dir = join(tmpdir(), 'rowbind-test-file-mapping');

  beforeAll(() => {
    mkdirSync(dir, { recursive: true });
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write a file and read the same records back', async () => {
    const filePath = join(dir, 'accounts.csv');
    const accounts: Account[] = [
      { id: 9007199254740993n, owner: 'Doe, Jane', balance: 120, verified: true, notes: '' },
      { id: -4n, owner: 'Ann "Tiny" Lee', balance: -3, verified: false, notes: '' },
    ];

    await writeFromRecords(filePath, Account, accounts);

    expect(readFileSync(filePath, 'utf-8')).toBe(
      'id,owner,balance,verified\n9007199254740993,"Doe, Jane",120,true\n-4,"Ann ""Tiny"" Lee",-3,false\n',
    );
    expect(await readToRecords(filePath, Account)).toEqual(accounts);
  });

  it('should read files with extra and reordered columns', async () => {
    const filePath = join(dir, 'export.csv');
    writeFileSync(filePath, 'verified,region,balance,owner,id\nT,eu,10.5,Ann,7\n', 'utf-8');

    expect(await readToRecords(filePath, Account)).toEqual([
      { id: 7n, owner: 'Ann', balance: 10.5, verified: true, notes: '' },
    ]);
  });

  it('should keep fractional digits when floatDigits is set', async () => {
    const filePath = join(dir, 'precise.csv');

    await writeFromRecords(filePath, Account, [{ id: 1n, owner: 'Ann', balance: 10.5, verified: true, notes: '' }], {
      floatDigits: 2,
    });

    expect(readFileSync(filePath, 'utf-8')).toBe('id,owner,balance,verified\n1,Ann,10.50,true\n');
  });

  it('should replace an existing file', async () => {
    const filePath = join(dir, 'replaced.csv');
    writeFileSync(filePath, 'stale content that is much longer than the new one\n', 'utf-8');

    await writeFromRecords(filePath, Account, []);

    expect(readFileSync(filePath, 'utf-8')).toBe('id,owner,balance,verified\n');
  });

  it('should fail with SOURCE_READ_ERROR for a missing file', async () => {
    await expect(readToRecords(join(dir, 'missing.csv'), Account)).rejects.toSatisfy((error: unknown) =>
      isRowbindError(error, 'SOURCE_READ_ERROR'),
    );
  });

  it('should report the data row of an invalid cell', async () => {
    const filePath = join(dir, 'bad.csv');
    writeFileSync(filePath, 'id,owner,balance,verified\n1,Ann,1,true\n2,Bob,1,true\nthree,Cid,1,true\n', 'utf-8');

    await expect(readToRecords(filePath, Account)).rejects.toMatchObject({
      code: 'INVALID_INT',
      row: 3,
      field: 'id',
      message: "row 3: field int64 'id' invalid: 'three'",
    });
  });
});
