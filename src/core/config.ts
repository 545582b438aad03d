import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { z } from 'zod';
import { FatalConfigError } from './errors.js';
import type { ResumePolicy, SaveMode } from './types.js';

/**
 * Scanner configuration from environment variables, with CLI flags layered
 * on top. Validation failures surface as FatalConfigError before any work
 * starts.
 */

export interface ScannerConfig {
  /** Contact header for SEC; '' for commands that never touch the network */
  userAgent: string;
  tmpRoot: string;
  stagingDir: string;
  ledgerPath: string;
  cachePath: string;
  archiveDir: string;
  maxRps: number;
  companyConcurrency: number;
  docConcurrency: number;
  maxFileBytes: number;
  includePdf: boolean;
  saveMode: SaveMode;
  resumePolicy: ResumePolicy;
  maxStagingBytes: number | null;
  useCache: boolean;
}

export interface ConfigOverrides {
  tmpRoot?: string;
  archiveDir?: string;
  maxRps?: number | string;
  companyConcurrency?: number | string;
  docConcurrency?: number | string;
  maxFileMb?: number | string;
  includePdf?: boolean;
  saveMode?: string;
  resumePolicy?: string;
  maxStagingMb?: number | string;
  useCache?: boolean;
}

export interface LoadConfigOptions {
  /** scan needs the contact header; flush, status and clear-temp do not */
  requireUserAgent?: boolean;
}

const ENV_KEYS = {
  userAgent: 'SEC_USER_AGENT',
  tmpRoot: 'SCANNER_TMP_ROOT',
  archiveDir: 'SCANNER_ARCHIVE_DIR',
  maxRps: 'SCANNER_MAX_RPS',
  companyConcurrency: 'SCANNER_COMPANY_CONCURRENCY',
  docConcurrency: 'SCANNER_DOC_CONCURRENCY',
  maxFileMb: 'SCANNER_MAX_FILE_MB',
  includePdf: 'SCANNER_INCLUDE_PDF',
  saveMode: 'SCANNER_SAVE_MODE',
  resumePolicy: 'SCANNER_RESUME_POLICY',
  maxStagingMb: 'SCANNER_MAX_STAGING_MB',
  useCache: 'SCANNER_USE_CACHE',
} as const;

type ConfigField = keyof typeof ENV_KEYS;

const flag = z.preprocess(value => {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return value;
}, z.boolean());

const configSchema = z.object({
  userAgent: z.string().trim().optional(),
  tmpRoot: z.string().min(1).default(() => join(homedir(), 'edgar_tmp')),
  archiveDir: z.string().min(1).default(() => join(homedir(), 'edgar_archive')),
  maxRps: z.coerce.number().positive().max(10).default(9.8),
  companyConcurrency: z.coerce.number().int().min(1).max(64).default(10),
  docConcurrency: z.coerce.number().int().min(1).max(100).default(20),
  maxFileMb: z.coerce.number().positive().default(20),
  includePdf: flag.default(false),
  saveMode: z.enum(['excerpt', 'full']).default('excerpt'),
  resumePolicy: z.enum(['restart', 'reuse']).default('restart'),
  maxStagingMb: z.coerce.number().positive().optional(),
  useCache: flag.default(true),
});

const CONTACT_EMAIL = /[^\s@]+@[^\s@]+\.[^\s@]+/;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {}
): ScannerConfig {
  const raw: Partial<Record<ConfigField, unknown>> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '' && isConfigField(field)) raw[field] = value;
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined && isConfigField(field)) raw[field] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? '') : '';
    const where = isConfigField(field) ? `${field} (${ENV_KEYS[field]})` : 'configuration';
    throw new FatalConfigError(`Invalid ${where}: ${issue ? issue.message : 'unexpected value'}`);
  }
  const c = parsed.data;

  const userAgent = c.userAgent ?? '';
  if (options.requireUserAgent ?? true) {
    if (userAgent === '') {
      throw new FatalConfigError(
        'SEC_USER_AGENT is not set. SEC requires a User-Agent with contact info, e.g. "Jane Doe jane@example.com".'
      );
    }
    if (!CONTACT_EMAIL.test(userAgent)) {
      throw new FatalConfigError(`SEC_USER_AGENT "${userAgent}" has no contact e-mail address.`);
    }
  }

  const tmpRoot = resolve(expandHome(c.tmpRoot));
  const stagingDir = join(tmpRoot, 'stage');
  const archiveDir = resolve(expandHome(c.archiveDir));
  if (isSameOrInside(archiveDir, stagingDir)) {
    throw new FatalConfigError(`Archive directory ${archiveDir} must not be the staging directory or inside it.`);
  }

  return {
    userAgent,
    tmpRoot,
    stagingDir,
    ledgerPath: join(tmpRoot, 'progress.txt'),
    cachePath: join(tmpRoot, 'cache.db'),
    archiveDir,
    maxRps: c.maxRps,
    companyConcurrency: c.companyConcurrency,
    docConcurrency: c.docConcurrency,
    maxFileBytes: Math.round(c.maxFileMb * 1024 * 1024),
    includePdf: c.includePdf,
    saveMode: c.saveMode,
    resumePolicy: c.resumePolicy,
    maxStagingBytes: c.maxStagingMb === undefined ? null : Math.round(c.maxStagingMb * 1024 * 1024),
    useCache: c.useCache,
  };
}

function isConfigField(name: string): name is ConfigField {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, name);
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function isSameOrInside(path: string, dir: string): boolean {
  const rel = relative(dir, path);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}
