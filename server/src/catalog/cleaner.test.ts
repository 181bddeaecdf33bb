import { describe, expect, it } from 'vitest';

import type { CatalogRow } from './catalogRow';
import { toNumber } from './catalogRow';
import { cleanCatalog } from './cleaner';

function row(name: string, patch: Partial<CatalogRow> = {}): CatalogRow {
  return {
    name,
    discoveryFacility: 'Kepler',
    ticId: null,
    radiusJ: 1,
    massJ: 1,
    eqTempK: 1000,
    starRadius: 1,
    jMag: 10,
    ...patch
  };
}

describe('cleanCatalog', () => {
  it('drops rows missing any required numeric field', () => {
    const rows = [
      row('keep'),
      row('no radius', { radiusJ: null }),
      row('no mass', { massJ: null }),
      row('no teq', { eqTempK: null }),
      row('no star', { starRadius: null }),
      row('no mag', { jMag: null }),
      row('no tic', { ticId: null })
    ];

    expect(cleanCatalog(rows).map((r) => r.name)).toEqual(['keep', 'no tic']);
  });

  it('is idempotent', () => {
    const rows = [row('a'), row('b', { jMag: null }), row('c')];
    const once = cleanCatalog(rows);
    expect(cleanCatalog(once)).toEqual(once);
  });

  it('accepts a result with no rows', () => {
    expect(cleanCatalog([row('x', { eqTempK: null })])).toEqual([]);
    expect(cleanCatalog([])).toEqual([]);
  });
});

describe('toNumber', () => {
  it('reads missing markers as null', () => {
    expect(toNumber('')).toBeNull();
    expect(toNumber('  ')).toBeNull();
    expect(toNumber('NaN')).toBeNull();
    expect(toNumber('abc')).toBeNull();
    expect(toNumber(undefined)).toBeNull();
  });

  it('parses plain and exponent notation', () => {
    expect(toNumber(' 1.25 ')).toBe(1.25);
    expect(toNumber('3e2')).toBe(300);
    expect(toNumber('0')).toBe(0);
  });
});
