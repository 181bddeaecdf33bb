import express, { type Express } from 'express';
import cors from 'cors';

import { errorMessage } from './observability/logger';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { applyRequestTracing } from './observability/requestTracing';
import { createSurveyRouter, type SurveyRunner } from './routes/survey';

export function createApp(runSurvey: SurveyRunner): Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());
  app.use(express.json());

  app.use('/api/survey', createSurveyRouter(runSurvey));

  app.get('/', (_req, res) => {
    res.type('text/plain').send('Transit survey plot – NASA Exoplanet Archive');
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}
