import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { dirname } from 'node:path';
import { mkdirSync, unlinkSync } from 'node:fs';

/**
 * SQLite cache for EDGAR metadata responses (submissions JSON, filing indexes).
 *
 * Document bodies are never cached: they are streamed and discarded.
 * Resilient to corruption: if the DB can't be opened, it's deleted and
 * recreated. Losing the cache only means re-fetching metadata.
 */

const MEM_CACHE_MAX = 100;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

export interface CacheStats {
  entries: number;
  sizeBytes: number;
}

export class ResponseCache {
  private db: Database.Database | null = null;
  /** In-memory FIFO for hot-path hits within a run */
  private readonly memCache = new Map<string, { body: string; expiresAt: number }>();

  constructor(public readonly path: string) {}

  get(url: string): string | null {
    const hash = hashUrl(url);
    const now = Date.now();

    const mem = this.memCache.get(hash);
    if (mem && mem.expiresAt > now) return mem.body;

    const row = this.open().prepare(
      'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
    ).get(hash, new Date(now).toISOString()) as { response_body: string; expires_at: string } | undefined;

    if (row) {
      this.remember(hash, row.response_body, new Date(row.expires_at).getTime());
      return row.response_body;
    }

    return null;
  }

  set(url: string, body: string, ttlHours: number = 24): void {
    const hash = hashUrl(url);
    const now = new Date();
    const expiresAt = now.getTime() + ttlHours * 60 * 60 * 1000;

    this.remember(hash, body, expiresAt);

    this.open().prepare(`
      INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(hash, url, body, now.toISOString(), new Date(expiresAt).toISOString());
  }

  clear(): void {
    this.memCache.clear();
    this.open().exec('DELETE FROM http_cache');
  }

  stats(): CacheStats {
    const row = this.open().prepare(
      'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
    ).get() as { count: number; size: number };
    return { entries: row.count, sizeBytes: row.size };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private open(): Database.Database {
    if (this.db) return this.db;

    mkdirSync(dirname(this.path), { recursive: true });

    try {
      this.db = connect(this.path);
    } catch {
      // DB corrupted; delete and recreate
      for (const suffix of ['', '-wal', '-shm']) {
        try { unlinkSync(this.path + suffix); } catch { /* not there */ }
      }
      this.db = connect(this.path);
    }

    return this.db;
  }

  private remember(hash: string, body: string, expiresAt: number): void {
    if (this.memCache.size >= MEM_CACHE_MAX) {
      // Evict oldest entry
      const firstKey = this.memCache.keys().next().value;
      if (firstKey !== undefined) this.memCache.delete(firstKey);
    }
    this.memCache.set(hash, { body, expiresAt });
  }
}

function connect(path: string): Database.Database {
  const db = new Database(path);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 3000');
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    db.close();
    throw err;
  }
}

export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}
