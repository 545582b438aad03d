import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Clock } from '../src/core/clock.js';
import type { FetchLike } from '../src/core/http-session.js';
import type { LogLevel, Logger } from '../src/core/logger.js';

/** Time only moves when someone sleeps */
export class VirtualClock implements Clock {
  private current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (signal?.aborted) return;
    this.current += Math.max(0, ms);
  }
}

export interface MemoryLogger extends Logger {
  lines: Array<{ level: LogLevel; message: string }>;
  messages(level: LogLevel): string[];
}

export function memoryLogger(): MemoryLogger {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  const push = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    messages: level => lines.filter(l => l.level === level).map(l => l.message),
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
}

export async function makeTempDir(prefix: string = 'edgar-scan-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export type Route = string | Uint8Array | Response | (() => Response);

export interface FakeFetch {
  fetch: FetchLike;
  /** "METHOD url" of every request, in order */
  calls: string[];
}

/**
 * In-process stand-in for EDGAR. Unknown URLs answer 404.
 */
export function fakeFetch(routes: Record<string, Route>): FakeFetch {
  const calls: string[] = [];
  const fetch: FetchLike = async (url, init) => {
    const method = init?.method ?? 'GET';
    calls.push(`${method} ${url}`);
    const route = routes[url];
    if (route === undefined) return new Response('not found', { status: 404 });
    if (typeof route === 'function') return route();
    if (route instanceof Response) return route;
    if (method === 'HEAD') {
      const size = typeof route === 'string' ? new TextEncoder().encode(route).byteLength : route.byteLength;
      return new Response(null, { status: 200, headers: { 'content-length': String(size) } });
    }
    return new Response(route, { status: 200 });
  };
  return { fetch, calls };
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}

export interface FakeFiling {
  accession: string;
  form: string;
  filingDate: string;
  primaryDocument: string;
}

export function submissionsJson(filings: readonly FakeFiling[], sic: string = '6199'): string {
  return json({
    cik: '1',
    name: 'Test Co',
    sic,
    filings: {
      recent: {
        accessionNumber: filings.map(f => f.accession),
        form: filings.map(f => f.form),
        filingDate: filings.map(f => f.filingDate),
        primaryDocument: filings.map(f => f.primaryDocument),
      },
      files: [],
    },
  });
}

export function indexJson(items: Array<{ name: string; size?: number }>): string {
  return json({
    directory: {
      item: items.map(i => ({ name: i.name, type: 'text/html', size: i.size === undefined ? '' : String(i.size) })),
    },
  });
}
