import fs from 'fs/promises';

import { CatalogFileError, CatalogParseError } from '../errors';
import { type CsvRecord, type CsvTable, readCsv } from '../lib/csv';
import { errorMessage, logInfo } from '../observability/logger';
import { type CatalogRow, toNumber } from './catalogRow';

const SOLAR_RADIUS_KM = 695_700;
const AU_IN_KM = 149_597_870.7;
const DEFAULT_ALBEDO = 0.1;
const TRANSIT_DETECTION = 'Primary Transit';

const REQUIRED_COLUMNS = [
  'name',
  'detection_type',
  'radius',
  'mass',
  'star_teff',
  'star_radius',
  'semi_major_axis',
  'mag_j'
] as const;

/**
 * T_eq = T_star * (1 - A)^(1/4) * sqrt(R_star / 2a)
 *
 * @param tStarK stellar effective temperature (K)
 * @param rStarSolar stellar radius (solar radii)
 * @param aAu orbital distance (AU)
 */
export function computeEquilibriumTemperature(
  tStarK: number,
  rStarSolar: number,
  aAu: number,
  albedo = DEFAULT_ALBEDO
): number {
  const rStarKm = rStarSolar * SOLAR_RADIUS_KM;
  const distanceKm = aAu * AU_IN_KM;
  return tStarK * Math.pow(1 - albedo, 0.25) * Math.sqrt(rStarKm / (2 * distanceKm));
}

function toCatalogRow(record: CsvRecord): CatalogRow {
  const tStar = toNumber(record.star_teff);
  const rStar = toNumber(record.star_radius);
  const a = toNumber(record.semi_major_axis);
  const eqTempK =
    tStar !== null && rStar !== null && a !== null && a > 0
      ? computeEquilibriumTemperature(tStar, rStar, a)
      : null;

  return {
    name: record.name.trim(),
    discoveryFacility: 'exoplanet.eu',
    ticId: null,
    radiusJ: toNumber(record.radius),
    massJ: toNumber(record.mass),
    eqTempK,
    starRadius: rStar,
    jMag: toNumber(record.mag_j)
  };
}

/** Header cells of the export look like "# name"; keep only the bare name. */
function stripHeader(name: string): string {
  return name.replace(/^[#\s]+|[#\s]+$/g, '');
}

export async function parseEuCatalog(text: string): Promise<CatalogRow[]> {
  let table: CsvTable;
  try {
    table = await readCsv(text, { mapHeader: stripHeader });
  } catch (err) {
    throw new CatalogParseError(`Unreadable exoplanet.eu catalog: ${errorMessage(err)}`, { cause: err });
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !table.header.includes(column));
  if (missing.length) {
    throw new CatalogParseError(`exoplanet.eu catalog is missing columns: ${missing.join(', ')}`);
  }

  return table.records.filter((r) => r.detection_type === TRANSIT_DETECTION).map(toCatalogRow);
}

/** Local alternative to the archive query, read from an exoplanet.eu CSV export. */
export async function loadEuCatalog(filePath: string): Promise<CatalogRow[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new CatalogFileError(filePath, `cannot read file: ${errorMessage(err)}`, { cause: err });
  }
  const rows = await parseEuCatalog(text);
  logInfo('catalog_loaded', { source: 'exoplanet.eu', filePath, rows: rows.length });
  return rows;
}
