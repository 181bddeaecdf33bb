import fs from 'fs/promises';

import { TargetFileError } from '../errors';
import { type CsvRecord, type CsvTable, readCsv } from '../lib/csv';
import { errorMessage } from '../observability/logger';
import type { TargetRecord } from './targetRecord';

const REQUIRED_COLUMNS = ['planet_name', 'published', 'in_prep', 'obs_complete'] as const;
const OPTIONAL_FLAG_COLUMN = 'future';

type FlagColumn = 'published' | 'in_prep' | 'obs_complete' | typeof OPTIONAL_FLAG_COLUMN;

function parseFlag(source: string, line: number, column: FlagColumn, raw: string | undefined): boolean {
  const value = (raw ?? '').trim();
  if (value === '1') return true;
  if (value === '0') return false;
  throw new TargetFileError(source, `column "${column}" must be 0 or 1, got "${value}"`, { line });
}

function toTargetRecord(source: string, record: CsvRecord, index: number, hasFuture: boolean): TargetRecord {
  // Data rows are numbered from 1; the header is not counted.
  const line = index + 1;
  const planetName = (record.planet_name ?? '').trim();
  if (!planetName) {
    throw new TargetFileError(source, 'empty planet_name', { line });
  }
  return {
    planetName,
    published: parseFlag(source, line, 'published', record.published),
    inPrep: parseFlag(source, line, 'in_prep', record.in_prep),
    obsComplete: parseFlag(source, line, 'obs_complete', record.obs_complete),
    future: hasFuture ? parseFlag(source, line, OPTIONAL_FLAG_COLUMN, record[OPTIONAL_FLAG_COLUMN]) : false
  };
}

export async function parseTargets(text: string, source = '<targets>'): Promise<TargetRecord[]> {
  let table: CsvTable;
  try {
    table = await readCsv(text);
  } catch (err) {
    throw new TargetFileError(source, `unreadable CSV: ${errorMessage(err)}`, { cause: err });
  }

  if (table.header.length === 0) {
    return [];
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !table.header.includes(column));
  if (missing.length) {
    throw new TargetFileError(source, `missing columns: ${missing.join(', ')}`);
  }

  const hasFuture = table.header.includes(OPTIONAL_FLAG_COLUMN);
  return table.records.map((record, index) => toTargetRecord(source, record, index, hasFuture));
}

/** Reads the survey's target list; a missing or malformed file is fatal. */
export async function loadTargets(filePath: string): Promise<TargetRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new TargetFileError(filePath, `cannot read file: ${errorMessage(err)}`, { cause: err });
  }
  return parseTargets(text, filePath);
}
