import { JSDOM } from 'jsdom';
import { describe, expect, it, vi } from 'vitest';

import type { CatalogRow } from '../catalog/catalogRow';
import { parseEnv } from '../config/env';
import { CatalogFetchError } from '../errors';
import { renderFigureSvg } from '../plot/svgRenderer';
import type { TargetRecord } from '../targets/targetRecord';
import { createSurveySources, runSurvey, type SurveySources } from './surveyService';

const complete: CatalogRow = {
  name: 'WASP-19 b',
  discoveryFacility: 'SuperWASP-South',
  ticId: 'TIC 100',
  radiusJ: 1.41,
  massJ: 1.15,
  eqTempK: 2100,
  starRadius: 1.0,
  jMag: 11.0
};

const missingRadius: CatalogRow = { ...complete, name: 'WASP-20 b', radiusJ: null };

function sources(catalog: CatalogRow[], targets: TargetRecord[]): SurveySources {
  return {
    loadCatalog: vi.fn(async () => catalog),
    loadTargets: vi.fn(async () => targets)
  };
}

describe('runSurvey', () => {
  it('yields one published target from a complete and an incomplete row', async () => {
    const result = await runSurvey(
      sources(
        [complete, missingRadius],
        [{ planetName: 'WASP-19 b', published: true, inPrep: false, obsComplete: false, future: false }]
      )
    );

    expect(result.rawCatalogCount).toBe(2);
    expect(result.catalog.map((r) => r.name)).toEqual(['WASP-19 b']);
    expect(result.targets).toHaveLength(1);
    expect(result.targets[0].status).toBe('Published');
    expect(result.unmatched).toEqual([]);
    expect(result.hiddenPoints).toBe(0);

    const published = result.figure.foreground.find((l) => l.status === 'Published');
    expect(published?.points).toEqual([{ name: 'WASP-19 b', x: 2100, y: 1.41 }]);
    expect(result.figure.foreground.filter((l) => l.points.length > 0)).toHaveLength(1);

    const doc = new JSDOM(renderFigureSvg(result.figure)).window.document;
    const circles = [...doc.querySelectorAll('g.foreground circle')];
    expect(circles.map((c) => c.getAttribute('fill'))).toEqual(['#009E73']);
  });

  it('draws only the background for an empty target list', async () => {
    const result = await runSurvey(sources([complete, missingRadius], []));

    expect(result.targets).toEqual([]);
    expect(result.figure.background.points).toHaveLength(1);
    expect(result.figure.foreground.every((l) => l.points.length === 0)).toBe(true);
  });

  it('reports targets missing from the catalog', async () => {
    const result = await runSurvey(
      sources([complete], [{ planetName: 'WASP-20 b', published: false, inPrep: true, obsComplete: false, future: false }])
    );

    expect(result.targets).toEqual([]);
    expect(result.unmatched).toEqual(['WASP-20 b']);
  });

  it('counts points clipped by the fixed axis limits', async () => {
    const scorching: CatalogRow = { ...complete, name: 'KELT-9 b', eqTempK: 4050 };
    const result = await runSurvey(
      sources(
        [complete, scorching],
        [{ planetName: 'KELT-9 b', published: false, inPrep: false, obsComplete: true, future: false }]
      )
    );

    expect(result.hiddenPoints).toBe(2);
  });

  it('queries the catalog on every run', async () => {
    const src = sources([complete], []);
    await runSurvey(src);
    await runSurvey(src);

    expect(src.loadCatalog).toHaveBeenCalledTimes(2);
  });

  it('fails the run when the catalog cannot be fetched', async () => {
    const src: SurveySources = {
      loadCatalog: async () => {
        throw new CatalogFetchError('Archive request failed: timeout', { status: 504 });
      },
      loadTargets: vi.fn(async () => [])
    };

    await expect(runSurvey(src)).rejects.toBeInstanceOf(CatalogFetchError);
    expect(src.loadTargets).not.toHaveBeenCalled();
  });
});

describe('createSurveySources', () => {
  it('reads targets relative to the working directory', async () => {
    const env = parseEnv({ TARGETS_PATH: 'server/test/fixtures/missing.csv' });
    const src = createSurveySources(env);

    await expect(src.loadTargets()).rejects.toThrow('missing.csv: cannot read file');
  });
});
