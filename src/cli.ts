import { parseArgs } from 'node:util';

import { CollectorError, describeError } from './api/base';
import type { FetchLike, RequestOptions } from './api/nasaClient';
import { loadConfig, type CollectorConfig, type ConfigOverrides } from './config';
import { compileDataset } from './lib/compile';
import { configureLogger, logError, logInfo } from './lib/log';
import { writeDataset } from './lib/output';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

export const USAGE = `Usage: neo-orbits [options]

Pages through the NEO browse listing, looks up each object's orbit in the
small-body database and writes the joined records to a JSON file.

Options:
  --out <path>                  output file (NEO_OUTPUT_PATH, default data/neo-orbits.json)
  --page-size <n>               NEOs per browse page, 1-20 (NEO_PAGE_SIZE, default 20)
  --max-pages <n>               stop after n browse pages (NEO_MAX_PAGES)
  --on-lookup-error <policy>    skip | null | abort (NEO_ON_LOOKUP_ERROR, default skip)
  --concurrency <n>             parallel orbit lookups, 1-8 (NEO_LOOKUP_CONCURRENCY, default 1)
  -h, --help                    show this help

The NASA API key is read from NASA_API_KEY.

Exit codes: 0 all entries written, 2 written with skipped or null-filled
lookups, 1 aborted with nothing written.`;

type Env = Record<string, string | undefined>;

function parseFlags(argv: string[]): ConfigOverrides | 'help' {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      out: { type: 'string' },
      'page-size': { type: 'string' },
      'max-pages': { type: 'string' },
      'on-lookup-error': { type: 'string' },
      concurrency: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) return 'help';
  return {
    outputPath: values.out,
    pageSize: values['page-size'],
    maxPages: values['max-pages'],
    onLookupError: values['on-lookup-error'],
    concurrency: values.concurrency,
  };
}

function toRequestOptions(config: CollectorConfig, fetchImpl?: FetchLike): RequestOptions {
  return { timeoutMs: config.timeoutMs, retries: config.retries, fetchImpl };
}

/** Runs one collection and resolves to the process exit code. */
export async function runCli(argv: string[], env: Env, deps: { fetchImpl?: FetchLike } = {}): Promise<number> {
  let config: CollectorConfig;
  try {
    const flags = parseFlags(argv);
    if (flags === 'help') {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return EXIT_OK;
    }
    config = loadConfig(env, flags);
  } catch (error) {
    logError('config_invalid', { error: describeError(error) });
    return EXIT_FAILURE;
  }

  configureLogger({ level: config.logLevel });
  const started = Date.now();
  const requestOptions = toRequestOptions(config, deps.fetchImpl);

  try {
    const { entries, report } = await compileDataset(
      {
        neo: { baseUrl: config.neoBaseUrl, apiKey: config.apiKey, pageSize: config.pageSize, request: requestOptions },
        sbdb: { url: config.sbdbUrl, request: requestOptions },
      },
      {
        maxPages: config.maxPages,
        onLookupError: config.onLookupError,
        concurrency: config.concurrency,
        throttleMs: config.throttleMs,
      },
    );

    await writeDataset(config.outputPath, entries);
    logInfo('dataset_written', {
      path: config.outputPath,
      summaries: report.summaries,
      entries: report.entries,
      skipped: report.skipped.length,
      skippedIds: report.skipped.map(s => s.neoId),
      nullFilled: report.nullFilled.length,
      duplicates: report.duplicates.length,
      durationMs: Date.now() - started,
    });

    return report.skipped.length || report.nullFilled.length ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    const fields: Record<string, unknown> = { error: describeError(error), durationMs: Date.now() - started };
    if (error instanceof CollectorError) {
      fields.kind = error.name;
    } else {
      fields.kind = 'UnexpectedError';
      fields.stack = error instanceof Error ? error.stack : undefined;
    }
    logError('run_aborted', fields);
    return EXIT_FAILURE;
  }
}
