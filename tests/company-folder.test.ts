import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DocumentRef, Filing } from '../src/core/types.js';
import {
  COMPLETE_MARKER,
  FolderStore,
  STAGING_MARKER,
  documentFileName,
  masterRecordFileName,
  parseDocumentFileName,
} from '../src/storage/company-folder.js';
import { makeTempDir, removeTempDir } from './helpers.js';

const CIK = '0000320193';
const filing: Filing = {
  cik: CIK,
  form: '10-K/A',
  filingDate: '2023-11-03',
  accession: '0000320193-23-000106',
  primaryDocument: 'aapl-20230930.htm',
};

describe('FolderStore', () => {
  let root: string;
  let store: FolderStore;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new FolderStore(join(root, 'stage'));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('moves a folder from absent to in progress to complete', async () => {
    expect(await store.state(CIK)).toBe('absent');

    await store.markInProgress(CIK);
    expect(await store.state(CIK)).toBe('in-progress');
    expect(await store.files(CIK)).toEqual([STAGING_MARKER]);

    await store.markComplete(CIK);
    await store.clearInProgress(CIK);
    expect(await store.state(CIK)).toBe('complete');
    expect(await store.files(CIK)).toEqual([COMPLETE_MARKER]);
  });

  it('lists company folders with their markers', async () => {
    await store.markInProgress('0000000002');
    await store.markInProgress('0000000001');
    await store.markComplete('0000000001');

    expect(await store.list()).toEqual([
      { cik: '0000000001', state: 'complete', hasStagingMarker: true },
      { cik: '0000000002', state: 'in-progress', hasStagingMarker: true },
    ]);
  });

  it('lists nothing when the root does not exist', async () => {
    expect(await store.list()).toEqual([]);
    expect(await store.sizeBytes()).toBe(0);
  });

  it('reset keeps only the in-progress marker', async () => {
    await store.markInProgress(CIK);
    await store.writeSic(CIK, '3571');
    await store.writeFile(CIK, 'a.htm', '<p>bitcoin</p>');
    await store.reset(CIK);
    expect(await store.files(CIK)).toEqual([STAGING_MARKER]);
  });

  it('serializes appends to the same file', async () => {
    await store.markInProgress(CIK);
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => store.appendLine(CIK, 'MATCHES.jsonl', JSON.stringify({ i })))
    );
    const lines = (await readFile(join(store.companyDir(CIK), 'MATCHES.jsonl'), 'utf-8')).trimEnd().split('\n');
    expect(lines).toEqual(Array.from({ length: 20 }, (_, i) => `{"i":${i}}`));
  });

  it('applies overlapping writes to one path in call order', async () => {
    await store.markInProgress(CIK);
    await Promise.all([
      store.writeFile(CIK, 'ex99-1.htm', 'a'.repeat(500_000)),
      store.writeFile(CIK, 'ex99-1.htm', '<p>second filing</p>'),
    ]);
    expect(await readFile(join(store.companyDir(CIK), 'ex99-1.htm'), 'utf-8')).toBe('<p>second filing</p>');
  });

  it('writes binary content unchanged and sums file sizes', async () => {
    await store.markInProgress(CIK);
    await store.writeFile(CIK, 'x.pdf', new Uint8Array([1, 2, 3, 4]));
    expect(await readFile(join(store.companyDir(CIK), 'x.pdf'))).toEqual(Buffer.from([1, 2, 3, 4]));
    // 4 bytes of PDF plus the 11-byte "in-progress" marker
    expect(await store.sizeBytes()).toBe(15);
  });
});

describe('document file names', () => {
  it('follows CIK_FORM_DATE_NAME with path-safe form types', () => {
    const ref: DocumentRef = {
      filing,
      name: 'aapl-20230930.htm',
      url: 'https://www.sec.gov/x',
      kind: 'html',
      declaredSize: null,
      isPrimary: true,
    };
    expect(documentFileName(CIK, ref)).toBe('0000320193_10-K-A_2023-11-03_aapl-20230930.htm');
  });

  it('names master-text records by accession', () => {
    expect(masterRecordFileName(CIK, filing)).toBe('0000320193_10-K-A_2023-11-03_0000320193-23-000106.txt');
    const ref: DocumentRef = {
      filing,
      name: '0000320193-23-000106.txt',
      url: 'https://www.sec.gov/x',
      kind: 'master',
      declaredSize: null,
      isPrimary: false,
    };
    expect(documentFileName(CIK, ref)).toBe(masterRecordFileName(CIK, filing));
  });

  it('parses saved names back into their parts', () => {
    expect(parseDocumentFileName('0000320193_8-K_2024-01-05_ex99-1.htm')).toEqual({
      cik: '0000320193',
      form: '8-K',
      filingDate: '2024-01-05',
      rest: 'ex99-1.htm',
    });
    expect(parseDocumentFileName('SIC.txt')).toBeNull();
  });
});
