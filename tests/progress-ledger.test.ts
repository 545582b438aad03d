import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ProgressLedger } from '../src/storage/progress-ledger.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('ProgressLedger', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    path = join(dir, 'progress.txt');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('starts empty when the file does not exist', async () => {
    const ledger = await ProgressLedger.open(path);
    expect(ledger.size).toBe(0);
    expect(ledger.last()).toBeNull();
  });

  it('appends one line per completion and reloads them', async () => {
    const ledger = await ProgressLedger.open(path);
    await ledger.record('0000000001');
    await ledger.record('0000000002');
    expect(await readFile(path, 'utf-8')).toBe('0000000001\n0000000002\n');

    const reopened = await ProgressLedger.open(path);
    expect(reopened.has('0000000001')).toBe(true);
    expect(reopened.entries()).toEqual(['0000000001', '0000000002']);
    expect(reopened.last()).toBe('0000000002');
  });

  it('never writes the same CIK twice', async () => {
    const ledger = await ProgressLedger.open(path);
    await Promise.all([ledger.record('0000000001'), ledger.record('0000000001')]);
    await ledger.record('0000000001');
    expect(await readFile(path, 'utf-8')).toBe('0000000001\n');
  });

  it('keeps concurrent appends on separate lines', async () => {
    const ledger = await ProgressLedger.open(path);
    const ciks = Array.from({ length: 30 }, (_, i) => String(i + 1).padStart(10, '0'));
    await Promise.all(ciks.map(cik => ledger.record(cik)));
    expect((await readFile(path, 'utf-8')).split('\n').filter(Boolean)).toEqual(ciks);
  });

  it('ignores a torn last line and starts the next append on a fresh line', async () => {
    await writeFile(path, '0000000001\n00000', 'utf-8');
    const ledger = await ProgressLedger.open(path);
    expect(ledger.entries()).toEqual(['0000000001']);

    await ledger.record('0000000003');
    expect(await readFile(path, 'utf-8')).toBe('0000000001\n00000\n0000000003\n');
    expect((await ProgressLedger.open(path)).entries()).toEqual(['0000000001', '0000000003']);
  });

  it('reopen drops a CIK from the skip-set without touching the file', async () => {
    const ledger = await ProgressLedger.open(path);
    await ledger.record('0000000001');
    ledger.reopen('0000000001');
    expect(ledger.has('0000000001')).toBe(false);
    expect(ledger.isPersisted('0000000001')).toBe(true);

    await ledger.record('0000000001');
    expect(ledger.has('0000000001')).toBe(true);
    expect(await readFile(path, 'utf-8')).toBe('0000000001\n');
  });

  it('clear removes the file', async () => {
    const ledger = await ProgressLedger.open(path);
    await ledger.record('0000000001');
    await ledger.clear();
    expect(ledger.size).toBe(0);
    expect((await ProgressLedger.open(path)).size).toBe(0);
  });
});
