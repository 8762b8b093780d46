import { z } from 'zod';

import type { NeoBrowse, NeoSummary } from '../types/nasa';
import { ParseError } from './base';
import { buildUrl, request, type RequestOptions } from './nasaClient';
import { logDebug, logWarn } from '../lib/log';

export const DEFAULT_PAGE_SIZE = 20;

export type NeoService = {
  baseUrl: string;
  apiKey: string;
  pageSize?: number;
  request?: RequestOptions;
};

const neoSummarySchema = z.object({ id: z.string().min(1) }).passthrough();

const browseSchema = z.object({
  page: z
    .object({
      number: z.number().int().nonnegative().optional(),
      total_pages: z.number().int().nonnegative(),
    })
    .passthrough(),
  near_earth_objects: z.array(z.unknown()),
});

function isNeoSummary(value: unknown): value is NeoSummary {
  return neoSummarySchema.safeParse(value).success;
}

function browseEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/neo/browse`;
}

export async function getNeoBrowse(service: NeoService, page: number): Promise<NeoBrowse> {
  const endpoint = browseEndpoint(service.baseUrl);
  const params = { page, size: service.pageSize ?? DEFAULT_PAGE_SIZE, api_key: service.apiKey };
  const body = await request<unknown>(endpoint, params, service.request);

  const url = buildUrl(endpoint, params);
  const parsed = browseSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
    throw new ParseError(url, detail);
  }

  // Elements are narrowed, not re-parsed, so they stay byte-for-byte what the service sent.
  const neos: NeoSummary[] = [];
  parsed.data.near_earth_objects.forEach((item, index) => {
    if (!isNeoSummary(item)) {
      throw new ParseError(url, `near_earth_objects[${index}] has no string id`);
    }
    neos.push(item);
  });

  return { page: parsed.data.page, near_earth_objects: neos };
}

/**
 * Lazily walks the browse listing from page 0. Stops at the reported
 * `total_pages`, on the first empty page, or after `maxPages` pages. A failed
 * page rejects the iteration; restarting means starting again from page 0.
 */
export async function* browseNeos(
  service: NeoService,
  opts: { maxPages?: number } = {},
): AsyncGenerator<NeoSummary, void, undefined> {
  const maxPages = opts.maxPages ?? Number.POSITIVE_INFINITY;
  let page = 0;
  let totalPages = 1;

  while (page < totalPages && page < maxPages) {
    const body = await getNeoBrowse(service, page);
    totalPages = body.page.total_pages;
    logDebug('neo_page_fetched', { page, totalPages, count: body.near_earth_objects.length });
    if (!body.near_earth_objects.length) break;
    yield* body.near_earth_objects;
    page += 1;
  }
}

export type CollectedNeos = {
  neos: NeoSummary[];
  duplicates: string[];
};

/** Drains {@link browseNeos}, keeping the first record seen for each id. */
export async function collectNeos(service: NeoService, opts: { maxPages?: number } = {}): Promise<CollectedNeos> {
  const seen = new Set<string>();
  const neos: NeoSummary[] = [];
  const duplicates: string[] = [];

  for await (const neo of browseNeos(service, opts)) {
    if (seen.has(neo.id)) {
      duplicates.push(neo.id);
      continue;
    }
    seen.add(neo.id);
    neos.push(neo);
  }

  if (duplicates.length) {
    logWarn('neo_duplicates_dropped', { count: duplicates.length, ids: duplicates.slice(0, 20) });
  }
  return { neos, duplicates };
}
