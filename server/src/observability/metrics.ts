import client from 'prom-client';

const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export type CatalogStage = 'raw' | 'clean';
export type RunOutcome = 'success' | 'failure';

const catalogFetchDuration = new client.Histogram({
  name: 'survey_catalog_fetch_duration_ms',
  help: 'Latency of the exoplanet archive query in milliseconds',
  buckets: [100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [registry]
});

const catalogRows = new client.Gauge({
  name: 'survey_catalog_rows',
  help: 'Catalog rows seen by the last survey run',
  labelNames: ['stage'],
  registers: [registry]
});

const targetsUnmatched = new client.Gauge({
  name: 'survey_targets_unmatched',
  help: 'Survey targets without a catalog row in the last run',
  registers: [registry]
});

const surveyRuns = new client.Counter({
  name: 'survey_runs_total',
  help: 'Survey pipeline runs',
  labelNames: ['outcome'],
  registers: [registry]
});

export const metricsContentType = registry.contentType;

export function recordCatalogFetch(latencyMs: number): void {
  catalogFetchDuration.observe(latencyMs);
}

export function recordCatalogRows(stage: CatalogStage, count: number): void {
  catalogRows.set({ stage }, count);
}

export function recordUnmatchedTargets(count: number): void {
  targetsUnmatched.set(count);
}

export function recordSurveyRun(outcome: RunOutcome): void {
  surveyRuns.inc({ outcome });
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
