import { describe, it, expect } from 'vitest';
import { HttpSession, parseRetryAfter, withSession, type FetchLike } from '../src/core/http-session.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import { StopToken } from '../src/core/stop-token.js';
import {
  NotFoundError,
  ScanInterruptedError,
  SecApiError,
  TransientNetworkError,
} from '../src/core/errors.js';
import { VirtualClock } from './helpers.js';

const USER_AGENT = 'Test Scanner test@example.com';
const DOC_URL = 'https://www.sec.gov/Archives/edgar/data/1/000000000124000001/doc.htm';

type Step = Error | (() => Response);

function reply(body: string, status: number = 200, headers: Record<string, string> = {}): () => Response {
  return () => new Response(body, { status, headers });
}

/** Fetch that plays back a fixed sequence of responses; the last one repeats */
function sequence(...steps: Step[]): { fetch: FetchLike; calls: () => number } {
  let i = 0;
  const fetch: FetchLike = async () => {
    const step = steps[Math.min(i, steps.length - 1)];
    i += 1;
    if (step instanceof Error) throw step;
    return step();
  };
  return { fetch, calls: () => i };
}

function makeSession(fetchImpl: FetchLike, stop?: StopToken) {
  const clock = new VirtualClock();
  const session = new HttpSession({
    userAgent: USER_AGENT,
    rateLimiter: new RateLimiter(1000, new VirtualClock()),
    fetchImpl,
    clock,
    stop,
  });
  return { session, clock };
}

describe('HttpSession', () => {
  it('sends the contact User-Agent on every request', async () => {
    const seen: Array<string | null> = [];
    const { session } = makeSession(async (_url, init) => {
      seen.push(new Headers(init?.headers).get('user-agent'));
      return new Response('ok');
    });
    await session.getText(DOC_URL);
    await session.getText(DOC_URL);
    expect(seen).toEqual([USER_AGENT, USER_AGENT]);
    expect(session.requests).toBe(2);
  });

  it('retries 5xx with the escalating backoff', async () => {
    const fake = sequence(
      reply('busy', 503),
      reply('busy', 502),
      reply('ok'),
    );
    const { session, clock } = makeSession(fake.fetch);
    expect(await session.getText(DOC_URL)).toBe('ok');
    expect(clock.sleeps).toEqual([15_000, 30_000]);
    expect(fake.calls()).toBe(3);
  });

  it('gives up after three retries', async () => {
    const fake = sequence(reply('down', 500));
    const { session, clock } = makeSession(fake.fetch);
    await expect(session.get(DOC_URL)).rejects.toBeInstanceOf(TransientNetworkError);
    expect(clock.sleeps).toEqual([15_000, 30_000, 60_000]);
    expect(fake.calls()).toBe(4);
  });

  it('retries network failures', async () => {
    const fake = sequence(new Error('ECONNRESET'), reply('ok'));
    const { session, clock } = makeSession(fake.fetch);
    expect(await session.getText(DOC_URL)).toBe('ok');
    expect(clock.sleeps).toEqual([15_000]);
  });

  it('honors Retry-After exactly without spending the retry budget', async () => {
    const limited = reply('slow down', 429, { 'retry-after': '2' });
    const fake = sequence(
      limited,
      limited,
      reply('down', 500),
      reply('down', 500),
      reply('down', 500),
      reply('ok'),
    );
    const { session, clock } = makeSession(fake.fetch);
    expect(await session.getText(DOC_URL)).toBe('ok');
    expect(clock.sleeps).toEqual([2_000, 2_000, 15_000, 30_000, 60_000]);
  });

  it('backs off on 429 without Retry-After', async () => {
    const fake = sequence(reply('slow down', 429), reply('ok'));
    const { session, clock } = makeSession(fake.fetch);
    expect(await session.getText(DOC_URL)).toBe('ok');
    expect(clock.sleeps).toEqual([15_000]);
  });

  it('does not retry 404 or 403', async () => {
    const missing = sequence(reply('gone', 404));
    await expect(makeSession(missing.fetch).session.get(DOC_URL)).rejects.toBeInstanceOf(NotFoundError);
    expect(missing.calls()).toBe(1);

    const forbidden = sequence(reply('no', 403));
    const error = await makeSession(forbidden.fetch).session.get(DOC_URL).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SecApiError);
    expect(error instanceof SecApiError ? error.statusCode : null).toBe(403);
    expect(forbidden.calls()).toBe(1);
  });

  it('refuses to start a request once a stop is requested', async () => {
    const fake = sequence(reply('ok'));
    const stop = new StopToken();
    stop.request();
    const { session } = makeSession(fake.fetch, stop);
    await expect(session.get(DOC_URL)).rejects.toBeInstanceOf(ScanInterruptedError);
    expect(fake.calls()).toBe(0);
  });

  it('stops retrying when interrupted during a backoff', async () => {
    const stop = new StopToken();
    let calls = 0;
    const { session } = makeSession(async () => {
      calls += 1;
      stop.request('SIGINT');
      return new Response('busy', { status: 503 });
    }, stop);
    await expect(session.get(DOC_URL)).rejects.toBeInstanceOf(ScanInterruptedError);
    expect(calls).toBe(1);
  });

  it('cancels unread bodies on close', async () => {
    let cancelled = false;
    const { session } = makeSession(async () => new Response(new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new Uint8Array(16));
      },
      cancel() {
        cancelled = true;
      },
    })));
    await session.get(DOC_URL);
    await session.close();
    expect(cancelled).toBe(true);
    await expect(session.get(DOC_URL)).rejects.toThrow('HttpSession is closed');
  });

  it('fails a body read that stalls past the timeout', async () => {
    let pulls = 0;
    let cancelled = false;
    const session = new HttpSession({
      userAgent: USER_AGENT,
      rateLimiter: new RateLimiter(1000, new VirtualClock()),
      fetchImpl: async () => new Response(new ReadableStream<Uint8Array>({
        pull(controller) {
          pulls += 1;
          if (pulls === 1) {
            controller.enqueue(new TextEncoder().encode('partial'));
            return;
          }
          return new Promise<void>(() => undefined);
        },
        cancel() {
          cancelled = true;
        },
      })),
      clock: new VirtualClock(),
      timeoutMs: 50,
    });

    const response = await session.get(DOC_URL);
    const received: Uint8Array[] = [];
    const reading = (async () => {
      for await (const chunk of session.chunks(response, 'doc.htm')) received.push(chunk);
    })();

    await expect(reading).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(reading).rejects.toThrow('Read of doc.htm stalled for 50ms');
    expect(received).toHaveLength(1);
    expect(cancelled).toBe(true);
  });

  it('reads text through the same chunked path', async () => {
    const { session } = makeSession(sequence(reply('{"cik": "1"}')).fetch);
    expect(await session.getText(DOC_URL)).toBe('{"cik": "1"}');
  });
});

describe('withSession', () => {
  it('closes the session when the body throws', async () => {
    const { session } = makeSession(sequence(reply('ok')).fetch);
    await expect(withSession(() => session, async () => {
      throw new Error('worker failed');
    })).rejects.toThrow('worker failed');
    await expect(session.get(DOC_URL)).rejects.toThrow('HttpSession is closed');
  });
});

describe('parseRetryAfter', () => {
  it('reads delay-seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120_000);
    expect(parseRetryAfter(' 1.5 ', 0)).toBe(1_500);
  });

  it('reads an HTTP-date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:27:50 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', now)).toBe(10_000);
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:27:00 GMT', now)).toBe(0);
  });

  it('returns null for missing or unusable values', () => {
    expect(parseRetryAfter(null, 0)).toBeNull();
    expect(parseRetryAfter('', 0)).toBeNull();
    expect(parseRetryAfter('soon', 0)).toBeNull();
  });
});
