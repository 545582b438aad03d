import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { FatalConfigError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { Company } from '../core/types.js';

/**
 * Company roster: the first sheet of an .xlsx/.xls workbook or a .csv file,
 * with a CIK column and a name column. Header matching ignores case.
 */

export type RosterRow = Record<string, unknown>;

export async function loadRoster(path: string): Promise<Company[]> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    throw new FatalConfigError(`Cannot read roster ${path}: ${errorMessage(err)}`);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (err) {
    throw new FatalConfigError(`Cannot parse roster ${path}: ${errorMessage(err)}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new FatalConfigError(`Roster ${path} has no sheets`);
  }

  const rows = XLSX.utils.sheet_to_json<RosterRow>(sheet, { defval: '' });
  return normalizeRoster(rows, path);
}

/**
 * Digits-only CIKs padded to 10, blank rows dropped, first occurrence of a
 * duplicate kept, roster order preserved.
 */
export function normalizeRoster(rows: readonly RosterRow[], source: string = 'roster'): Company[] {
  if (rows.length === 0) return [];

  const columns = Object.keys(rows[0]);
  const cikColumn = findColumn(columns, 'cik');
  if (cikColumn === null) {
    throw new FatalConfigError(`${source} has no CIK column (found: ${columns.join(', ') || 'none'})`);
  }
  const nameColumn = findColumn(columns, 'name');

  const seen = new Set<string>();
  const companies: Company[] = [];
  for (const row of rows) {
    const digits = cellText(row[cikColumn]).replace(/\D/g, '');
    if (digits === '' || digits.length > 10) continue;
    const cik = digits.padStart(10, '0');
    if (seen.has(cik)) continue;
    seen.add(cik);
    companies.push({
      cik,
      name: nameColumn === null ? '' : cellText(row[nameColumn]).trim(),
    });
  }
  return companies;
}

export interface RosterSelection {
  /** Start at this CIK, inclusive */
  startFrom?: string | null;
  /** Start after this CIK; typically the last progress ledger entry */
  resumeAfter?: string | null;
  /**
   * Completed companies. With resumeAfter, companies before the cut that are
   * not done are kept, ahead of the rest.
   */
  isDone?: (cik: string) => boolean;
}

export function selectCompanies(
  companies: readonly Company[],
  selection: RosterSelection,
  logger: Logger = silentLogger
): Company[] {
  if (selection.startFrom) {
    const cik = toCik(selection.startFrom);
    const index = companies.findIndex(c => c.cik === cik);
    if (index < 0) {
      logger.info(`--start-from CIK ${cik} is not in the roster; starting from the beginning`);
      return [...companies];
    }
    logger.info(`Starting from CIK ${cik} (roster position ${index + 1})`);
    return companies.slice(index);
  }

  if (selection.resumeAfter) {
    const cik = toCik(selection.resumeAfter);
    const index = companies.findIndex(c => c.cik === cik);
    if (index < 0) {
      logger.info(`Last completed CIK ${cik} is not in the roster; starting from the beginning`);
      return [...companies];
    }
    const isDone = selection.isDone;
    const unfinished = isDone ? companies.slice(0, index).filter(c => !isDone(c.cik)) : [];
    logger.info(`Resuming after CIK ${cik} (roster position ${index + 1})`);
    if (unfinished.length > 0) {
      logger.info(
        `Also scanning ${unfinished.length} earlier compan${unfinished.length === 1 ? 'y' : 'ies'} ` +
        `not in the progress ledger: ${unfinished.map(c => c.cik).join(', ')}`
      );
    }
    return [...unfinished, ...companies.slice(index + 1)];
  }

  return [...companies];
}

function toCik(value: string): string {
  return value.replace(/\D/g, '').padStart(10, '0');
}

function findColumn(columns: readonly string[], wanted: string): string | null {
  return columns.find(c => c.trim().toLowerCase() === wanted) ?? null;
}

function cellText(value: unknown): string {
  if (typeof value === 'number') return Number.isFinite(value) ? String(Math.trunc(value)) : '';
  if (typeof value === 'string') return value;
  return '';
}
