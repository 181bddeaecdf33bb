import { createApp } from './app';
import { env } from './config/env';
import { DEFAULT_SURVEY_CONFIG } from './config/survey';
import { logInfo } from './observability/logger';
import { createSurveySources, runSurvey } from './services/surveyService';

const sources = createSurveySources(env);
const app = createApp((options) => runSurvey(sources, DEFAULT_SURVEY_CONFIG, options));

app.listen(env.PORT, () => {
  logInfo('api_server_started', { port: env.PORT, catalogSource: env.CATALOG_SOURCE });
});
