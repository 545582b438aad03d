import { systemClock, type Clock } from './clock.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { RateLimiter } from './rate-limiter.js';
import type { StopToken } from './stop-token.js';
import {
  NotFoundError,
  RateLimitSignal,
  ScanInterruptedError,
  SecApiError,
  TransientNetworkError,
  errorMessage,
} from './errors.js';

/**
 * HTTP session owned by a single company worker.
 *
 * Every request passes through the shared RateLimiter and carries the SEC
 * contact header. Failures are retried with an escalating backoff:
 * - network errors, 5xx, and 429 without a usable Retry-After consume the retry budget
 * - 429 with Retry-After is waited out exactly and does not consume it
 * - 404 and 403 are thrown immediately
 *
 * Response bodies handed out by the session are tracked and cancelled on
 * close(), so an early return never leaves a socket streaming.
 */

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpSessionOptions {
  userAgent: string;
  rateLimiter: RateLimiter;
  fetchImpl?: FetchLike;
  clock?: Clock;
  stop?: StopToken;
  logger?: Logger;
  /** Retries after the first attempt. */
  maxRetries?: number;
  backoffMs?: readonly number[];
  /** Upper bound on Retry-After waits per request. */
  maxRateLimitWaits?: number;
  /** Time allowed until response headers arrive, and for each body read after that. */
  timeoutMs?: number;
}

export interface RequestOptions {
  method?: 'GET' | 'HEAD';
  label?: string;
  accept?: string;
}

export const DEFAULT_BACKOFF_MS = [15_000, 30_000, 60_000] as const;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_MAX_RATE_LIMIT_WAITS = 5;
const DEFAULT_TIMEOUT_MS = 60_000;

export class HttpSession {
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly backoffMs: readonly number[];
  private readonly maxRateLimitWaits: number;
  private readonly timeoutMs: number;
  private readonly openBodies = new Set<ReadableStream<Uint8Array>>();
  private closed = false;
  private requestCount = 0;

  constructor(private readonly options: HttpSessionOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.maxRateLimitWaits = options.maxRateLimitWaits ?? DEFAULT_MAX_RATE_LIMIT_WAITS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Requests issued through this session, retries included. */
  get requests(): number {
    return this.requestCount;
  }

  get(url: string, label?: string): Promise<Response> {
    return this.request(url, { method: 'GET', label });
  }

  head(url: string, label?: string): Promise<Response> {
    return this.request(url, { method: 'HEAD', label });
  }

  async getText(url: string, label?: string): Promise<string> {
    const response = await this.get(url, label);
    const decoder = new TextDecoder('utf-8');
    let text = '';
    for await (const chunk of this.chunks(response, label ?? url)) {
      text += decoder.decode(chunk, { stream: true });
    }
    return text + decoder.decode();
  }

  /**
   * Body of a response from this session, chunk by chunk. A read that stalls
   * longer than the timeout fails with TransientNetworkError. Leaving the
   * loop early cancels the rest of the body.
   */
  async *chunks(response: Response, label: string): AsyncGenerator<Uint8Array, void, undefined> {
    const body = response.body;
    if (!body) return;
    const reader = body.getReader();
    try {
      for (;;) {
        const { done, value } = await this.withReadTimeout(() => reader.read(), response.url || label, label);
        if (done) return;
        yield value;
      }
    } finally {
      reader.cancel().catch(() => undefined);
      reader.releaseLock();
      this.consumed(response);
    }
  }

  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    if (this.closed) {
      throw new Error(`HttpSession is closed (requested ${url})`);
    }

    const method = options.method ?? 'GET';
    const label = options.label ?? url;
    let attempt = 0;
    let rateLimitWaits = 0;

    for (;;) {
      if (this.options.stop?.requested) {
        throw new ScanInterruptedError(url);
      }

      await this.options.rateLimiter.acquire();
      this.requestCount += 1;

      let response: Response;
      try {
        response = await this.send(url, method, options.accept);
      } catch (err) {
        const failure = new TransientNetworkError(
          `Network error fetching ${label}: ${errorMessage(err)}`,
          0,
          url
        );
        attempt = await this.backoffOrThrow(failure, attempt, label);
        continue;
      }

      if (response.ok) {
        if (response.body) this.openBodies.add(response.body);
        return response;
      }

      await discardBody(response);

      if (response.status === 404) {
        throw new NotFoundError(url);
      }

      if (response.status === 403) {
        throw new SecApiError(
          'SEC API rejected request (403 Forbidden). Check SEC_USER_AGENT: SEC requires a User-Agent with contact info.',
          403,
          url
        );
      }

      if (response.status === 429) {
        const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), Date.now());
        if (retryAfterMs !== null && rateLimitWaits < this.maxRateLimitWaits) {
          rateLimitWaits += 1;
          const signal = new RateLimitSignal(url, retryAfterMs);
          this.logger.warn(`429 on ${label}; sleeping ${Math.round(signal.retryAfterMs / 1000)}s as asked`);
          await this.pause(signal.retryAfterMs);
          continue;
        }
        const failure = new TransientNetworkError(`SEC rate limit (429) on ${label}`, 429, url);
        attempt = await this.backoffOrThrow(failure, attempt, label);
        continue;
      }

      if (response.status >= 500) {
        const failure = new TransientNetworkError(
          `SEC server error ${response.status} on ${label}`,
          response.status,
          url
        );
        attempt = await this.backoffOrThrow(failure, attempt, label);
        continue;
      }

      throw new SecApiError(
        `SEC API error: ${response.status} ${response.statusText}`,
        response.status,
        url
      );
    }
  }

  /** Cancel a response body the caller stopped reading. */
  release(response: Response): void {
    const body = response.body;
    if (!body || !this.openBodies.delete(body)) return;
    if (!body.locked) {
      body.cancel().catch(() => undefined);
    }
  }

  /** Mark a body as fully consumed by the caller. */
  consumed(response: Response): void {
    if (response.body) this.openBodies.delete(response.body);
  }

  async close(): Promise<void> {
    this.closed = true;
    const bodies = [...this.openBodies];
    this.openBodies.clear();
    await Promise.all(bodies.map(async body => {
      if (body.locked) return;
      try {
        await body.cancel();
      } catch {
        // Stream already errored; nothing left to release
      }
    }));
  }

  private async send(url: string, method: 'GET' | 'HEAD', accept?: string): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': accept ?? '*/*',
          'Accept-Encoding': 'gzip, deflate',
        },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private async withReadTimeout<T>(read: () => Promise<T>, url: string, label: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransientNetworkError(`Read of ${label} stalled for ${this.timeoutMs}ms`, 0, url));
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([read(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async backoffOrThrow(failure: TransientNetworkError, attempt: number, label: string): Promise<number> {
    if (attempt >= this.maxRetries) {
      this.logger.warn(`gave up on ${label} after ${this.maxRetries} retries`);
      throw failure;
    }
    const waitMs = this.backoffMs[Math.min(attempt, this.backoffMs.length - 1)] ?? 0;
    this.logger.warn(`${failure.message}; sleep ${Math.round(waitMs / 1000)}s (try ${attempt + 1})`);
    await this.pause(waitMs);
    return attempt + 1;
  }

  private pause(ms: number): Promise<void> {
    return this.clock.sleep(ms, this.options.stop?.signal);
  }
}

/**
 * Create a session, hand it to `fn`, and close it on every exit path.
 */
export async function withSession<T>(
  create: () => HttpSession,
  fn: (session: HttpSession) => Promise<T>
): Promise<T> {
  const session = create();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

/**
 * Retry-After is either delay-seconds or an HTTP-date.
 * Returns milliseconds to wait, or null when the header is absent or unusable.
 */
export function parseRetryAfter(value: string | null, nowMs: number): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - nowMs);
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch {
    // Body already closed
  }
}
