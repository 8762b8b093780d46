import { HttpError, NetworkError, ParseError, describeError, isRetryable, redactUrl } from './base';
import { logWarn } from '../lib/log';

export type RequestParams = Record<string, string | number>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type RequestOptions = RequestInit & {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
};

type RawResponse = { ok: boolean; status: number; text: string };

export function buildUrl(base: string, params: RequestParams = {}): string {
  if (!/^https?:\/\//i.test(base)) {
    throw new Error(`Service URL must be absolute: ${base}`);
  }
  const url = new URL(base);
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, String(v));
  return url.toString();
}

function createTimeoutSignal(timeoutMs: number) {
  let timedOut = false;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  return {
    signal: controller.signal,
    cleanup: () => clearTimeout(timeoutId),
    didTimeout: () => timedOut,
  };
}

function mergeAbortSignals(signals: AbortSignal[]): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const unlisteners: Array<() => void> = [];

  const cleanup = () => {
    while (unlisteners.length) {
      const off = unlisteners.pop();
      if (off) off();
    }
  };

  const abortFrom = (signal: AbortSignal) => {
    if (controller.signal.aborted) return;
    cleanup();
    controller.abort(signal.reason);
  };

  for (const signal of signals) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }
    const handler = () => abortFrom(signal);
    signal.addEventListener('abort', handler, { once: true });
    unlisteners.push(() => signal.removeEventListener('abort', handler));
  }

  return { signal: controller.signal, cleanup };
}

async function fetchRaw(url: string, init: RequestOptions): Promise<RawResponse> {
  const { timeoutMs = 30_000, signal: externalSignal, headers: initHeaders, fetchImpl = fetch, ...restInit } = init;

  const cleanups: Array<() => void> = [];
  const signals: AbortSignal[] = [];
  let didTimeout = () => false;

  if (timeoutMs > 0) {
    const timeout = createTimeoutSignal(timeoutMs);
    signals.push(timeout.signal);
    cleanups.push(timeout.cleanup);
    didTimeout = timeout.didTimeout;
  }

  if (externalSignal) {
    signals.push(externalSignal);
  }

  let signal: AbortSignal | undefined;
  if (signals.length === 1) {
    signal = signals[0];
  } else if (signals.length > 1) {
    const merged = mergeAbortSignals(signals);
    signal = merged.signal;
    cleanups.push(merged.cleanup);
  }

  const headers = new Headers(initHeaders);
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }

  const requestInit: RequestInit = { ...restInit, headers, signal };
  if (!requestInit.method) {
    requestInit.method = 'GET';
  }

  try {
    const resp = await fetchImpl(url, requestInit);
    const text = await resp.text();
    return { ok: resp.ok, status: resp.status, text };
  } catch (error) {
    if (didTimeout()) throw new NetworkError(url, error, true);
    // A caller-initiated abort is not a transport failure.
    if (externalSignal?.aborted) throw error;
    throw new NetworkError(url, error);
  } finally {
    for (const cleanup of cleanups) cleanup();
  }
}

export function parseJsonBody<T>(url: string, text: string): T {
  if (!text.trim()) {
    throw new ParseError(url, 'empty body');
  }
  try {
    return JSON.parse(text) as T;
  } catch {
    throw new ParseError(url, `non-JSON body: ${text.slice(0, 200)}`);
  }
}

/**
 * GET `base` with `params` and return the decoded JSON body.
 *
 * Transport failures, 429 and 5xx answers are retried `retries` times with a
 * doubling delay; anything else propagates on the first attempt.
 */
export async function request<T>(base: string, params: RequestParams = {}, init?: RequestOptions): Promise<T> {
  const url = buildUrl(base, params);
  const { retries = 2, retryDelayMs = 500, ...rest } = init ?? {};

  return withRetry(
    async () => {
      const resp = await fetchRaw(url, rest);
      if (!resp.ok) throw new HttpError(url, resp.status, resp.text);
      return parseJsonBody<T>(url, resp.text);
    },
    retries,
    retryDelayMs,
    (error, attempt, delayMs) => {
      logWarn('request_retry', { url: redactUrl(url), attempt, delayMs, error: describeError(error) });
    },
  );
}

async function wait(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise(resolve => setTimeout(resolve, ms));
}

async function withRetry<T>(
  fn: () => Promise<T>,
  retries = 0,
  delayMs = 0,
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void,
): Promise<T> {
  let attempt = 0;
  const maxAttempts = Math.max(0, Math.floor(retries)) + 1;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      attempt += 1;
      if (attempt >= maxAttempts || !isRetryable(error)) {
        break;
      }
      const backoff = delayMs * 2 ** (attempt - 1);
      onRetry?.(error, attempt, backoff);
      await wait(backoff);
    }
  }

  throw lastError;
}
