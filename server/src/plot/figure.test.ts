import { describe, expect, it } from 'vitest';

import type { CleanCatalogRow } from '../catalog/catalogRow';
import { DEFAULT_SURVEY_CONFIG } from '../config/survey';
import { joinTargets } from '../survey/joiner';
import type { TargetRecord } from '../targets/targetRecord';
import { buildFigure, countHiddenPoints, isWithinLimits } from './figure';

function catalogRow(name: string, eqTempK: number, radiusJ: number): CleanCatalogRow {
  return { name, discoveryFacility: 'TESS', ticId: null, radiusJ, massJ: 1, eqTempK, starRadius: 1, jMag: 9 };
}

function target(planetName: string, flags: Partial<TargetRecord> = {}): TargetRecord {
  return { planetName, published: false, inPrep: false, obsComplete: false, future: false, ...flags };
}

const catalog = [catalogRow('A b', 1500, 1.2), catalogRow('B b', 800, 0.4), catalogRow('C b', 2000, 1.7)];
const records = [
  target('A b', { published: true, inPrep: true }),
  target('B b', { obsComplete: true, future: true }),
  target('C b', { future: true })
];

describe('buildFigure', () => {
  const { targets } = joinTargets(catalog, records, DEFAULT_SURVEY_CONFIG);

  it('uses fixed axes and the whole catalog as background', () => {
    const figure = buildFigure(catalog, targets, DEFAULT_SURVEY_CONFIG);

    expect(figure.title).toBe('Survey targets');
    expect(figure.x).toEqual({ label: 'Equilibrium temperature (K)', limits: [0, 3000] });
    expect(figure.y).toEqual({ label: 'Planetary radius (R_J)', limits: [0, 2.2] });
    expect(figure.background.marker).toEqual({ shape: 'open-circle', color: 'darkgrey', size: 4 });
    expect(figure.background.points).toEqual([
      { name: 'A b', x: 1500, y: 1.2 },
      { name: 'B b', x: 800, y: 0.4 },
      { name: 'C b', x: 2000, y: 1.7 }
    ]);
  });

  it('groups targets by status in category order with the parallel palette', () => {
    const figure = buildFigure(catalog, targets, DEFAULT_SURVEY_CONFIG);

    expect(figure.foreground.map((l) => [l.label, l.marker.color, l.points.map((p) => p.name)])).toEqual([
      ['Published', '#009E73', ['A b']],
      ['In prep.', '#0072B2', []],
      ['Analysis underway', '#E69F00', ['B b']],
      ['Collecting data', 'grey', ['C b']]
    ]);
    expect(figure.foreground[0].marker).toEqual({ shape: 'filled-circle', color: '#009E73', size: 10, stroke: 'black' });
  });

  it('uses independent flag filters for the flag grouping', () => {
    const figure = buildFigure(catalog, targets, DEFAULT_SURVEY_CONFIG, { grouping: 'flags', title: 'Flags' });

    expect(figure.title).toBe('Flags');
    expect(figure.foreground.map((l) => l.points.map((p) => p.name))).toEqual([['A b'], ['A b'], ['B b'], ['B b', 'C b']]);
  });

  it('follows a custom palette', () => {
    const config = {
      ...DEFAULT_SURVEY_CONFIG,
      categories: DEFAULT_SURVEY_CONFIG.categories.map((c) => ({ ...c, color: 'red' }))
    };
    const figure = buildFigure(catalog, targets, config);
    expect(figure.foreground.map((l) => l.marker.color)).toEqual(['red', 'red', 'red', 'red']);
  });
});

describe('isWithinLimits', () => {
  const axes = { x: DEFAULT_SURVEY_CONFIG.x, y: DEFAULT_SURVEY_CONFIG.y };

  it('accepts points on the boundary', () => {
    expect(isWithinLimits(axes, { name: 'a', x: 0, y: 2.2 })).toBe(true);
    expect(isWithinLimits(axes, { name: 'a', x: 3000, y: 0 })).toBe(true);
  });

  it('rejects points past the fixed limits', () => {
    expect(isWithinLimits(axes, { name: 'a', x: 3200, y: 1 })).toBe(false);
    expect(isWithinLimits(axes, { name: 'a', x: 1000, y: 2.5 })).toBe(false);
  });
});

describe('countHiddenPoints', () => {
  it('counts background and foreground points past the limits', () => {
    const rows = [catalogRow('Hot b', 3400, 1.0), catalogRow('Big b', 1000, 2.6), catalogRow('Fine b', 900, 0.5)];
    const { targets } = joinTargets(rows, [target('Hot b', { published: true })], DEFAULT_SURVEY_CONFIG);
    const figure = buildFigure(rows, targets, DEFAULT_SURVEY_CONFIG);

    expect(countHiddenPoints(figure)).toBe(3);
  });

  it('is zero when everything is on the axes', () => {
    const { targets } = joinTargets(catalog, records, DEFAULT_SURVEY_CONFIG);
    expect(countHiddenPoints(buildFigure(catalog, targets, DEFAULT_SURVEY_CONFIG))).toBe(0);
  });
});
