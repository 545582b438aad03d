import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { expandHome, loadConfig } from '../src/core/config.js';
import { FatalConfigError } from '../src/core/errors.js';

const AGENT = 'Test Scanner test@example.com';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ SEC_USER_AGENT: AGENT });
    expect(config).toEqual({
      userAgent: AGENT,
      tmpRoot: join(homedir(), 'edgar_tmp'),
      stagingDir: join(homedir(), 'edgar_tmp', 'stage'),
      ledgerPath: join(homedir(), 'edgar_tmp', 'progress.txt'),
      cachePath: join(homedir(), 'edgar_tmp', 'cache.db'),
      archiveDir: join(homedir(), 'edgar_archive'),
      maxRps: 9.8,
      companyConcurrency: 10,
      docConcurrency: 20,
      maxFileBytes: 20 * 1024 * 1024,
      includePdf: false,
      saveMode: 'excerpt',
      resumePolicy: 'restart',
      maxStagingBytes: null,
      useCache: true,
    });
  });

  it('reads environment variables and ignores blank ones', () => {
    const config = loadConfig({
      SEC_USER_AGENT: AGENT,
      SCANNER_TMP_ROOT: '/var/scan/tmp',
      SCANNER_ARCHIVE_DIR: '/mnt/archive',
      SCANNER_MAX_RPS: '5',
      SCANNER_DOC_CONCURRENCY: '  ',
      SCANNER_INCLUDE_PDF: 'yes',
      SCANNER_SAVE_MODE: 'full',
      SCANNER_RESUME_POLICY: 'reuse',
      SCANNER_MAX_STAGING_MB: '100',
    });
    expect(config).toMatchObject({
      stagingDir: '/var/scan/tmp/stage',
      ledgerPath: '/var/scan/tmp/progress.txt',
      archiveDir: '/mnt/archive',
      maxRps: 5,
      docConcurrency: 20,
      includePdf: true,
      saveMode: 'full',
      resumePolicy: 'reuse',
      maxStagingBytes: 100 * 1024 * 1024,
    });
  });

  it('lets command-line overrides win over the environment', () => {
    const config = loadConfig(
      { SEC_USER_AGENT: AGENT, SCANNER_MAX_RPS: '5', SCANNER_COMPANY_CONCURRENCY: '4' },
      { maxRps: '3', useCache: false, includePdf: undefined }
    );
    expect(config.maxRps).toBe(3);
    expect(config.companyConcurrency).toBe(4);
    expect(config.useCache).toBe(false);
  });

  it('requires a contact header with an e-mail address', () => {
    expect(() => loadConfig({})).toThrow(FatalConfigError);
    expect(() => loadConfig({})).toThrow(/SEC_USER_AGENT is not set/);
    expect(() => loadConfig({ SEC_USER_AGENT: 'Test Scanner' })).toThrow(
      'SEC_USER_AGENT "Test Scanner" has no contact e-mail address.'
    );
  });

  it('does not need the contact header for storage-only commands', () => {
    expect(loadConfig({}, {}, { requireUserAgent: false }).userAgent).toBe('');
  });

  it('names the variable behind an invalid value', () => {
    expect(() => loadConfig({ SEC_USER_AGENT: AGENT, SCANNER_MAX_RPS: '11' })).toThrow(
      'Invalid maxRps (SCANNER_MAX_RPS): Number must be less than or equal to 10'
    );
    expect(() => loadConfig({ SEC_USER_AGENT: AGENT, SCANNER_SAVE_MODE: 'everything' })).toThrow(FatalConfigError);
    expect(() => loadConfig({ SEC_USER_AGENT: AGENT, SCANNER_INCLUDE_PDF: 'maybe' })).toThrow(FatalConfigError);
    expect(() => loadConfig({ SEC_USER_AGENT: AGENT }, { companyConcurrency: '0' })).toThrow(FatalConfigError);
  });

  it('rejects an archive inside the staging directory', () => {
    expect(() => loadConfig({
      SEC_USER_AGENT: AGENT,
      SCANNER_TMP_ROOT: '/data/tmp',
      SCANNER_ARCHIVE_DIR: '/data/tmp/stage/archive',
    })).toThrow('Archive directory /data/tmp/stage/archive must not be the staging directory or inside it.');

    expect(loadConfig({
      SEC_USER_AGENT: AGENT,
      SCANNER_TMP_ROOT: '/data/tmp',
      SCANNER_ARCHIVE_DIR: '/data/tmp/archive',
    }).archiveDir).toBe('/data/tmp/archive');
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~/edgar')).toBe(join(homedir(), 'edgar'));
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('/opt/~edgar')).toBe('/opt/~edgar');
  });
});
