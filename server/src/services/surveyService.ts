import path from 'path';

import type { CatalogRow, CleanCatalogRow } from '../catalog/catalogRow';
import { cleanCatalog } from '../catalog/cleaner';
import { loadEuCatalog } from '../catalog/euCatalog';
import type { Env } from '../config/env';
import { DEFAULT_SURVEY_CONFIG, type SurveyConfig } from '../config/survey';
import { fetchTransitingPlanets } from '../nasa/exoplanetArchiveClient';
import { errorMessage, logError, logInfo } from '../observability/logger';
import { recordCatalogRows, recordSurveyRun } from '../observability/metrics';
import { buildFigure, countHiddenPoints, type Figure, type FigureOptions } from '../plot/figure';
import { type ClassifiedTarget, joinTargets } from '../survey/joiner';
import type { TargetRecord } from '../targets/targetRecord';
import { loadTargets } from '../targets/targetsLoader';

export interface SurveySources {
  loadCatalog: (correlationId?: string) => Promise<CatalogRow[]>;
  loadTargets: () => Promise<TargetRecord[]>;
}

export interface SurveyResult {
  generatedAt: string;
  rawCatalogCount: number;
  catalog: CleanCatalogRow[];
  targets: ClassifiedTarget[];
  unmatched: string[];
  /** Points outside the fixed axis limits, clipped from the plot. */
  hiddenPoints: number;
  figure: Figure;
}

export interface SurveyRunOptions extends FigureOptions {
  requestId?: string;
}

export function createSurveySources(config: Env): SurveySources {
  const cwd = process.cwd();
  return {
    loadCatalog:
      config.CATALOG_SOURCE === 'eu'
        ? () => loadEuCatalog(path.resolve(cwd, config.EU_CATALOG_PATH))
        : (correlationId) =>
            fetchTransitingPlanets({
              baseUrl: config.ARCHIVE_URL,
              timeoutMs: config.ARCHIVE_TIMEOUT_MS,
              correlationId
            }),
    loadTargets: () => loadTargets(path.resolve(cwd, config.TARGETS_PATH))
  };
}

/**
 * Runs fetch → clean → join → classify → plot once. Nothing is cached: every
 * call queries the catalog again, and any I/O failure fails the run.
 */
export async function runSurvey(
  sources: SurveySources,
  config: SurveyConfig = DEFAULT_SURVEY_CONFIG,
  options?: SurveyRunOptions
): Promise<SurveyResult> {
  try {
    const raw = await sources.loadCatalog(options?.requestId);
    const catalog = cleanCatalog(raw);
    recordCatalogRows('raw', raw.length);
    recordCatalogRows('clean', catalog.length);

    const targetRecords = await sources.loadTargets();
    const { targets, unmatched } = joinTargets(catalog, targetRecords, config);
    const figure = buildFigure(catalog, targets, config, options);
    const hiddenPoints = countHiddenPoints(figure);

    logInfo('survey_built', {
      requestId: options?.requestId,
      catalogRows: raw.length,
      cleanRows: catalog.length,
      targets: targets.length,
      unmatched: unmatched.length,
      hiddenPoints
    });
    recordSurveyRun('success');

    return {
      generatedAt: new Date().toISOString(),
      rawCatalogCount: raw.length,
      catalog,
      targets,
      unmatched,
      hiddenPoints,
      figure
    };
  } catch (err) {
    recordSurveyRun('failure');
    logError('survey_failed', { requestId: options?.requestId, error: errorMessage(err) });
    throw err;
  }
}
