import fs from 'fs/promises';
import path from 'path';

import { env } from '../config/env';
import { DEFAULT_SURVEY_CONFIG } from '../config/survey';
import { logInfo } from '../observability/logger';
import { renderFigureSvg } from '../plot/svgRenderer';
import { createSurveySources, runSurvey } from '../services/surveyService';

async function main() {
  const args = process.argv.slice(2);
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const outPath = path.resolve(process.cwd(), positional[0] ?? 'survey_targets.svg');
  const grouping = args.includes('--flags') ? 'flags' : 'status';

  const result = await runSurvey(createSurveySources(env), DEFAULT_SURVEY_CONFIG, { grouping });
  await fs.writeFile(outPath, renderFigureSvg(result.figure), 'utf8');

  logInfo('plot_written', {
    outPath,
    targets: result.targets.length,
    unmatched: result.unmatched
  });
}

main().catch((err) => {
  process.stderr.write(String(err) + '\n');
  process.exit(1);
});
