import { z } from 'zod';

import { ConfigError } from './api/base';

export const DEFAULT_NEO_BASE = 'https://api.nasa.gov/neo/rest/v1';
export const DEFAULT_SBDB_URL = 'https://ssd-api.jpl.nasa.gov/sbdb.api';
export const DEFAULT_OUTPUT_PATH = 'data/neo-orbits.json';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const int = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const configSchema = z.object({
  apiKey: z.preprocess(blankToUndefined, z.string({ required_error: 'NASA_API_KEY is required' }).trim()),
  outputPath: z.preprocess(blankToUndefined, z.string().default(DEFAULT_OUTPUT_PATH)),
  // The browse service rejects pages larger than 20.
  pageSize: z.preprocess(blankToUndefined, int(1, 20).default(20)),
  maxPages: z.preprocess(blankToUndefined, int(1, Number.MAX_SAFE_INTEGER).optional()),
  neoBaseUrl: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_NEO_BASE)),
  sbdbUrl: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_SBDB_URL)),
  onLookupError: z.preprocess(blankToUndefined, z.enum(['skip', 'null', 'abort']).default('skip')),
  concurrency: z.preprocess(blankToUndefined, int(1, 8).default(1)),
  throttleMs: z.preprocess(blankToUndefined, int(0, 60_000).default(0)),
  timeoutMs: z.preprocess(blankToUndefined, int(0, 600_000).default(30_000)),
  retries: z.preprocess(blankToUndefined, int(0, 10).default(2)),
  logLevel: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

export type CollectorConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = { [K in keyof CollectorConfig]?: string };

type Env = Record<string, string | undefined>;

/**
 * Resolves configuration from environment variables, with `overrides`
 * (command-line flags) taking precedence.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): CollectorConfig {
  const input = {
    apiKey: overrides.apiKey ?? env.NASA_API_KEY,
    outputPath: overrides.outputPath ?? env.NEO_OUTPUT_PATH,
    pageSize: overrides.pageSize ?? env.NEO_PAGE_SIZE,
    maxPages: overrides.maxPages ?? env.NEO_MAX_PAGES,
    neoBaseUrl: overrides.neoBaseUrl ?? env.NEO_API_BASE,
    sbdbUrl: overrides.sbdbUrl ?? env.SBDB_API_URL,
    onLookupError: overrides.onLookupError ?? env.NEO_ON_LOOKUP_ERROR,
    concurrency: overrides.concurrency ?? env.NEO_LOOKUP_CONCURRENCY,
    throttleMs: overrides.throttleMs ?? env.NEO_THROTTLE_MS,
    timeoutMs: overrides.timeoutMs ?? env.NEO_TIMEOUT_MS,
    retries: overrides.retries ?? env.NEO_RETRIES,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL,
  };

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
