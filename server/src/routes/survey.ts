import { Router, type Request, type Response } from 'express';

import { CatalogFetchError } from '../errors';
import { errorMessage, logError } from '../observability/logger';
import type { Grouping } from '../plot/figure';
import { renderFigureSvg } from '../plot/svgRenderer';
import type { SurveyResult, SurveyRunOptions } from '../services/surveyService';

export type SurveyRunner = (options: SurveyRunOptions) => Promise<SurveyResult>;

function parseGrouping(req: Request): Grouping {
  const raw = req.query?.grouping;
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value === 'flags' ? 'flags' : 'status';
}

function sendFailure(req: Request, res: Response, event: string, err: unknown): void {
  const requestId = req.requestId;
  logError(event, {
    error: errorMessage(err),
    requestId,
    query: req.query
  });
  const status = err instanceof CatalogFetchError ? 502 : 500;
  res.status(status).json({
    error: status === 502 ? 'Exoplanet archive unavailable' : 'Survey pipeline failed',
    requestId
  });
}

export function createSurveyRouter(runSurvey: SurveyRunner): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    try {
      const result = await runSurvey({ requestId: req.requestId });
      res.json({
        generatedAt: result.generatedAt,
        catalogCount: result.catalog.length,
        targets: result.targets,
        unmatched: result.unmatched,
        hiddenPoints: result.hiddenPoints,
        categories: result.figure.foreground.map((layer) => ({
          status: layer.status,
          color: layer.marker.color
        }))
      });
    } catch (err) {
      sendFailure(req, res, 'survey_request_failed', err);
    }
  });

  router.get('/plot.svg', async (req: Request, res: Response) => {
    try {
      const result = await runSurvey({ requestId: req.requestId, grouping: parseGrouping(req) });
      res.type('image/svg+xml').send(renderFigureSvg(result.figure));
    } catch (err) {
      sendFailure(req, res, 'survey_plot_failed', err);
    }
  });

  return router;
}
