import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { loadConfig, type ScannerConfig } from '../src/core/config.js';
import { FatalConfigError } from '../src/core/errors.js';
import { executeClearTemp, executeScan, executeStatus } from '../src/core/scan-engine.js';
import { StopToken } from '../src/core/stop-token.js';
import {
  VirtualClock,
  fakeFetch,
  indexJson,
  makeTempDir,
  memoryLogger,
  removeTempDir,
  submissionsJson,
  type FakeFetch,
} from './helpers.js';

const ARCHIVE = 'https://www.sec.gov/Archives/edgar/data';

function edgar(): FakeFetch {
  return fakeFetch({
    'https://data.sec.gov/submissions/CIK0000000001.json': submissionsJson([
      { accession: '0000000001-24-000001', form: '10-K', filingDate: '2024-03-01', primaryDocument: 'k.htm' },
    ]),
    [`${ARCHIVE}/1/000000000124000001/index.json`]: indexJson([{ name: 'k.htm' }]),
    [`${ARCHIVE}/1/000000000124000001/k.htm`]: '<p>Mining of bitcoin and other crypto assets.</p>',
    'https://data.sec.gov/submissions/CIK0000000002.json': submissionsJson([
      { accession: '0000000002-24-000007', form: '8-K', filingDate: '2024-01-10', primaryDocument: 'pr.htm' },
    ]),
    [`${ARCHIVE}/2/000000000224000007/index.json`]: indexJson([{ name: 'pr.htm' }]),
    [`${ARCHIVE}/2/000000000224000007/pr.htm`]: '<p>Results for the quarter.</p>',
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('scan engine', () => {
  let dir: string;
  let config: ScannerConfig;
  let rosterPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = loadConfig({
      SEC_USER_AGENT: 'Test Scanner test@example.com',
      SCANNER_TMP_ROOT: join(dir, 'tmp'),
      SCANNER_ARCHIVE_DIR: join(dir, 'archive'),
      SCANNER_MAX_RPS: '10',
      SCANNER_USE_CACHE: 'off',
    });
    rosterPath = join(dir, 'roster.csv');
    await writeFile(rosterPath, 'CIK,Company Name\n1,Alpha Holdings\n2,Beta Corp\n', 'utf-8');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function scan(fake: FakeFetch, params: { yearsBack?: number; resumeFromLast?: boolean } = {}) {
    return executeScan(
      { rosterPath, yearsBack: params.yearsBack ?? 5, resumeFromLast: params.resumeFromLast },
      {
        config,
        logger: memoryLogger(),
        stop: new StopToken(),
        fetchImpl: fake.fetch,
        clock: new VirtualClock(),
        now: () => new Date('2024-06-15T00:00:00Z'),
        maxRetries: 0,
      }
    );
  }

  it('rejects a lookback that is not a positive whole number', async () => {
    await expect(scan(edgar(), { yearsBack: 0 })).rejects.toThrow(FatalConfigError);
    await expect(scan(edgar(), { yearsBack: 2.5 })).rejects.toThrow('--years must be a positive whole number (got 2.5)');
  });

  it('scans the roster into the archive and reports status', async () => {
    const result = await scan(edgar());

    expect(result.selected).toBe(2);
    expect(result.recovery.inProgress).toEqual([]);
    expect(result.summary).toMatchObject({
      status: 'completed',
      completed: 2,
      documentsScanned: 2,
      documentsSaved: 1,
      flush: { moved: 2, failed: 0 },
    });

    const status = await executeStatus(config);
    expect(status.staging.companies).toBe(0);
    expect(status.archive).toMatchObject({
      companies: 2,
      complete: 2,
      inProgress: 0,
      files: 1,
      byExtension: { '.htm': 1 },
      byForm: { '10-K': 1 },
    });
    expect(status.ledgerEntries).toBe(2);
  });

  it('resumes after the last CIK in the ledger', async () => {
    await mkdir(dirname(config.ledgerPath), { recursive: true });
    await writeFile(config.ledgerPath, '0000000001\n', 'utf-8');
    const fake = edgar();

    const result = await scan(fake, { resumeFromLast: true });

    expect(result.selected).toBe(1);
    expect(result.summary).toMatchObject({ status: 'completed', total: 1, completed: 1, skipped: 0 });
    expect(fake.calls.some(call => call.includes('CIK0000000001'))).toBe(false);
  });

  it('does not skip an unfinished company that precedes the last ledger entry', async () => {
    await writeFile(rosterPath, 'CIK,Company Name\n1,Alpha Holdings\n2,Beta Corp\n3,Gamma Trust\n', 'utf-8');
    await mkdir(dirname(config.ledgerPath), { recursive: true });
    await writeFile(config.ledgerPath, '0000000001\n0000000003\n', 'utf-8');
    await mkdir(join(config.stagingDir, '0000000002'), { recursive: true });
    await writeFile(join(config.stagingDir, '0000000002', '.STAGING'), 'in-progress', 'utf-8');
    const fake = edgar();

    const result = await scan(fake, { resumeFromLast: true });

    expect(result.recovery.inProgress).toEqual(['0000000002']);
    expect(result.selected).toBe(1);
    expect(result.summary).toMatchObject({ status: 'completed', total: 1, completed: 1 });
    expect(fake.calls).toContain('GET https://data.sec.gov/submissions/CIK0000000002.json');
    expect(await readFile(config.ledgerPath, 'utf-8')).toBe('0000000001\n0000000003\n0000000002\n');
  });

  it('clears staging and, when asked, the progress ledger', async () => {
    await scan(edgar());

    const kept = await executeClearTemp(config);
    expect(kept).toEqual({ stagingDir: config.stagingDir, ledgerPath: null });
    expect(await exists(config.stagingDir)).toBe(false);
    expect(await exists(config.ledgerPath)).toBe(true);

    const cleared = await executeClearTemp(config, { includeProgress: true });
    expect(cleared.ledgerPath).toBe(config.ledgerPath);
    expect(await exists(config.ledgerPath)).toBe(false);
  });
});
