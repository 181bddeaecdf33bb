import type { CatalogRow, CleanCatalogRow } from './catalogRow';

function isClean(row: CatalogRow): row is CatalogRow & CleanCatalogRow {
  return (
    row.radiusJ !== null &&
    row.massJ !== null &&
    row.eqTempK !== null &&
    row.starRadius !== null &&
    row.jMag !== null
  );
}

/**
 * Drops rows missing any of the numeric fields the plot and the join rely on.
 * Order is preserved; an empty result is valid.
 */
export function cleanCatalog(rows: readonly CatalogRow[]): CleanCatalogRow[] {
  return rows.filter(isClean);
}
