import axios, { type AxiosInstance } from 'axios';

import { type CatalogRow, toNumber, toOptionalString } from '../catalog/catalogRow';
import { ARCHIVE_COLUMNS, ARCHIVE_CONDITION, ARCHIVE_TABLE, type ArchiveColumn } from '../config/survey';
import { CatalogFetchError, CatalogParseError } from '../errors';
import { type CsvRecord, type CsvTable, readCsv } from '../lib/csv';
import { errorMessage, logDebug, logInfo } from '../observability/logger';
import { recordCatalogFetch } from '../observability/metrics';

export interface ArchiveClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Injected in tests; defaults to the shared axios instance. */
  http?: AxiosInstance;
  correlationId?: string;
}

export function buildArchiveQuery(
  columns: readonly string[] = ARCHIVE_COLUMNS,
  table = ARCHIVE_TABLE,
  condition = ARCHIVE_CONDITION
): string {
  return `select ${columns.join(',')} from ${table} where ${condition}`;
}

function toCatalogRow(record: CsvRecord): CatalogRow {
  const cell = (column: ArchiveColumn) => record[column];
  return {
    name: cell('pl_name') ?? '',
    discoveryFacility: cell('disc_facility') ?? '',
    ticId: toOptionalString(cell('tic_id')),
    radiusJ: toNumber(cell('pl_radj')),
    massJ: toNumber(cell('pl_bmassj')),
    eqTempK: toNumber(cell('pl_eqt')),
    starRadius: toNumber(cell('st_rad')),
    jMag: toNumber(cell('sy_jmag'))
  };
}

export async function parseArchiveCsv(body: string): Promise<CatalogRow[]> {
  let table: CsvTable;
  try {
    table = await readCsv(body);
  } catch (err) {
    throw new CatalogParseError(`Unreadable archive response: ${errorMessage(err)}`, { cause: err });
  }

  const missing = ARCHIVE_COLUMNS.filter((column) => !table.header.includes(column));
  if (missing.length) {
    throw new CatalogParseError(`Archive response is missing columns: ${missing.join(', ')}`);
  }

  return table.records.map(toCatalogRow);
}

/**
 * Queries the NASA Exoplanet Archive TAP service for every planet flagged as
 * transiting. One request, no retry and no caching: any failure ends the run.
 */
export async function fetchTransitingPlanets(options: ArchiveClientOptions): Promise<CatalogRow[]> {
  const http = options.http ?? axios;
  const url = `${options.baseUrl.replace(/\/+$/, '')}/sync`;
  const query = buildArchiveQuery();
  const started = Date.now();
  logDebug('catalog_query', { url, query, requestId: options.correlationId });

  let body: unknown;
  try {
    const res = await http.get<unknown>(url, {
      params: { query, format: 'csv' },
      responseType: 'text',
      timeout: options.timeoutMs ?? 0
    });
    body = res.data;
  } catch (err) {
    const status = axios.isAxiosError(err) ? err.response?.status : undefined;
    throw new CatalogFetchError(`Archive request failed: ${errorMessage(err)}`, { status, cause: err });
  }

  const latencyMs = Date.now() - started;
  recordCatalogFetch(latencyMs);

  if (typeof body !== 'string') {
    throw new CatalogParseError('Archive response body is not text');
  }

  const rows = await parseArchiveCsv(body);
  logInfo('catalog_fetched', {
    source: 'nasa-exoplanet-archive',
    rows: rows.length,
    latencyMs,
    requestId: options.correlationId
  });
  return rows;
}
