import { z } from 'zod';

import type { OrbitalRecord } from '../types/sbdb';
import { ParseError } from './base';
import { buildUrl, request, type RequestOptions } from './nasaClient';

export type SbdbService = {
  url: string;
  request?: RequestOptions;
};

const lookupSchema = z
  .object({
    object: z.object({ spkid: z.string().optional() }).passthrough().optional(),
    orbit: z.object({}).passthrough().optional(),
  })
  .passthrough();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOrbitalRecord(value: unknown): value is OrbitalRecord {
  return lookupSchema.safeParse(value).success;
}

function describeIssues(value: unknown): string {
  const parsed = lookupSchema.safeParse(value);
  if (parsed.success) return 'unexpected shape';
  return parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

// The service answers an unknown designation with 200 and `{ code, message }`.
function notFoundMessage(body: OrbitalRecord): string | undefined {
  if (body.object !== undefined || body.orbit !== undefined) return undefined;
  return typeof body.message === 'string' ? body.message : undefined;
}

/**
 * One lookup by `sstr`. The body is returned as sent; it is rejected when it
 * is not an object, is a not-found notice, or names a different spkid.
 */
export async function getSbdb(service: SbdbService, neoId: string): Promise<OrbitalRecord> {
  const params = { sstr: neoId };
  const body = await request<unknown>(service.url, params, service.request);
  const url = buildUrl(service.url, params);

  if (!isPlainObject(body)) {
    throw new ParseError(url, 'expected a JSON object');
  }
  if (!isOrbitalRecord(body)) {
    throw new ParseError(url, describeIssues(body));
  }

  const missing = notFoundMessage(body);
  if (missing !== undefined) {
    throw new ParseError(url, missing);
  }

  const spkid = body.object?.spkid;
  if (spkid !== undefined && spkid !== neoId) {
    throw new ParseError(url, `answered for ${spkid}, expected ${neoId}`);
  }
  return body;
}
