import { LookupError, describeError } from '../api/base';
import { collectNeos, type NeoService } from '../api/fetch_neo';
import { getSbdb, type SbdbService } from '../api/fetch_sbdb';
import type { NeoSummary } from '../types/nasa';
import type { OrbitalRecord } from '../types/sbdb';
import { mapOrdered } from '../utils/pool';
import { logInfo, logWarn } from './log';

export type LookupFailurePolicy = 'skip' | 'null' | 'abort';

export interface CompiledEntry {
  neoInfo: NeoSummary;
  /** `null` only under the `null` failure policy. */
  orbitalData: OrbitalRecord | null;
}

export type CompiledDataset = CompiledEntry[];

export interface CompileReport {
  summaries: number;
  entries: number;
  skipped: Array<{ neoId: string; reason: string }>;
  nullFilled: string[];
  duplicates: string[];
}

export interface CompileDeps {
  neo: NeoService;
  sbdb: SbdbService;
}

export interface CompileOptions {
  maxPages?: number;
  onLookupError?: LookupFailurePolicy;
  concurrency?: number;
  throttleMs?: number;
  progressEvery?: number;
}

type LookupOutcome =
  | { neo: NeoSummary; orbit: OrbitalRecord }
  | { neo: NeoSummary; failure: LookupError };

const sleep = (ms: number) => new Promise(res => setTimeout(res, ms));

export async function compileDataset(
  deps: CompileDeps,
  opts: CompileOptions = {},
): Promise<{ entries: CompiledDataset; report: CompileReport }> {
  const policy = opts.onLookupError ?? 'skip';
  const concurrency = opts.concurrency ?? 1;
  const throttle = opts.throttleMs ?? 0;
  const progressEvery = opts.progressEvery ?? 100;

  const { neos, duplicates } = await collectNeos(deps.neo, { maxPages: opts.maxPages });
  logInfo('neo_browse_complete', { count: neos.length, duplicates: duplicates.length });

  let claimed = 0;
  let done = 0;
  const outcomes = await mapOrdered(neos, concurrency, async (neo): Promise<LookupOutcome> => {
    claimed += 1;
    let outcome: LookupOutcome;
    try {
      outcome = { neo, orbit: await getSbdb(deps.sbdb, neo.id) };
    } catch (error) {
      const failure = new LookupError(neo.id, error);
      if (policy === 'abort') throw failure;
      outcome = { neo, failure };
    }
    done += 1;
    if (done % progressEvery === 0) {
      logInfo('lookup_progress', { done, total: neos.length });
    }
    // No pause once every lookup has been handed out.
    if (throttle > 0 && claimed < neos.length) await sleep(throttle);
    return outcome;
  });

  const entries: CompiledDataset = [];
  const report: CompileReport = { summaries: neos.length, entries: 0, skipped: [], nullFilled: [], duplicates };

  for (const outcome of outcomes) {
    if ('orbit' in outcome) {
      entries.push({ neoInfo: outcome.neo, orbitalData: outcome.orbit });
      continue;
    }
    const reason = describeError(outcome.failure.cause);
    if (policy === 'null') {
      logWarn('lookup_null_filled', { neoId: outcome.neo.id, reason });
      report.nullFilled.push(outcome.neo.id);
      entries.push({ neoInfo: outcome.neo, orbitalData: null });
    } else {
      logWarn('lookup_skipped', { neoId: outcome.neo.id, reason });
      report.skipped.push({ neoId: outcome.neo.id, reason });
    }
  }

  report.entries = entries.length;
  return { entries, report };
}
