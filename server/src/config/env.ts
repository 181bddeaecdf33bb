import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).default(3000),
  ARCHIVE_URL: z.string().url().default('https://exoplanetarchive.ipac.caltech.edu/TAP'),
  // 0 disables the axios timeout.
  ARCHIVE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  TARGETS_PATH: z.string().min(1).default('data/targets.csv'),
  CATALOG_SOURCE: z.enum(['archive', 'eu']).default('archive'),
  EU_CATALOG_PATH: z.string().min(1).default('data/exoplanet.eu_catalog.csv'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
