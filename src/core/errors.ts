/**
 * Error types for the scanner.
 *
 * Only FatalConfigError and ScanInterruptedError are allowed to end a run.
 * Everything else is scoped to one document, one filing or one company.
 */

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

/** Timeouts, connection resets, 5xx, and 429s once the retry budget is spent. */
export class TransientNetworkError extends SecApiError {
  constructor(message: string, statusCode: number, url: string) {
    super(message, statusCode, url);
    this.name = 'TransientNetworkError';
  }
}

/** An explicit 429 carrying a Retry-After hint. */
export class RateLimitSignal extends SecApiError {
  constructor(url: string, public readonly retryAfterMs: number) {
    super(
      `SEC API rate limit hit; server asked to wait ${Math.round(retryAfterMs / 1000)}s.`,
      429,
      url
    );
    this.name = 'RateLimitSignal';
  }
}

export class SizeExceededError extends Error {
  constructor(
    public readonly url: string,
    public readonly declaredBytes: number,
    public readonly limitBytes: number
  ) {
    super(`Document ${url} is ${formatMb(declaredBytes)} MB, over the ${formatMb(limitBytes)} MB cap`);
    this.name = 'SizeExceededError';
  }
}

export class MalformedMetadataError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'MalformedMetadataError';
  }
}

export class FatalConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalConfigError';
  }
}

export class ScanInterruptedError extends Error {
  constructor(public readonly url: string = '') {
    super(url ? `Interrupted before requesting ${url}` : 'Scan interrupted');
    this.name = 'ScanInterruptedError';
  }
}

/** Retryable failures: network errors, 5xx and rate limiting. */
export function isTransient(err: unknown): boolean {
  return err instanceof TransientNetworkError || err instanceof RateLimitSignal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatMb(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}
