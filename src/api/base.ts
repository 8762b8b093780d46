// src/api/base.ts
// Error taxonomy shared by the request layer, the orchestrator and the CLI.
// URLs are stored with the api_key redacted so errors can be logged as-is.

export class CollectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends CollectorError {
  readonly url: string;

  constructor(url: string, cause: unknown, public timedOut = false) {
    const safeUrl = redactUrl(url);
    super(
      timedOut ? `Request to ${safeUrl} timed out` : `Network failure for ${safeUrl}: ${describeError(cause)}`,
      { cause },
    );
    this.url = safeUrl;
  }
}

export class HttpError extends CollectorError {
  readonly url: string;

  constructor(url: string, public status: number, public bodyText: string) {
    const safeUrl = redactUrl(url);
    super(`HTTP ${status} for ${safeUrl}`);
    this.url = safeUrl;
  }
}

export class ParseError extends CollectorError {
  readonly url: string;

  constructor(url: string, public detail: string) {
    const safeUrl = redactUrl(url);
    super(`Unexpected response from ${safeUrl}: ${detail}`);
    this.url = safeUrl;
  }
}

export class WriteError extends CollectorError {
  constructor(public path: string, cause: unknown) {
    super(`Failed to write ${path}: ${describeError(cause)}`, { cause });
  }
}

export class LookupError extends CollectorError {
  constructor(public neoId: string, cause: unknown) {
    super(`Orbital lookup failed for ${neoId}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends CollectorError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof HttpError) return error.status === 429 || error.status >= 500;
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function redactUrl(url: string): string {
  return url.replace(/([?&]api_key=)[^&#]*/gi, '$1***');
}
