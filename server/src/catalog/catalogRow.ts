export interface CatalogRow {
  name: string;
  discoveryFacility: string;
  ticId: string | null;
  /** Planetary radius in Jupiter radii. */
  radiusJ: number | null;
  /** Planetary mass in Jupiter masses. */
  massJ: number | null;
  eqTempK: number | null;
  /** Host star radius in solar radii. */
  starRadius: number | null;
  jMag: number | null;
}

export type RequiredField = 'radiusJ' | 'massJ' | 'eqTempK' | 'starRadius' | 'jMag';

export type CleanCatalogRow = Omit<CatalogRow, RequiredField> & {
  [K in RequiredField]: number;
};

export function toNumber(value: string | undefined | null): number | null {
  if (value === undefined || value === null) return null;
  const s = value.trim();
  if (!s) return null;
  const lower = s.toLowerCase();
  if (lower === 'nan' || lower === 'na' || lower === 'null') return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function toOptionalString(value: string | undefined | null): string | null {
  if (value === undefined || value === null) return null;
  const s = value.trim();
  return s ? s : null;
}
