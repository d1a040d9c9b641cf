/**
 * Cache of service health probes, keyed by endpoint URL.
 *
 * The cache is owned by the caller and injected into discovery. It only
 * stores and returns reports; how old a report may be before it is probed
 * again is the caller's choice (see `isFresh`).
 */
import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types
// ============================================================================

export interface HealthReport {
  url: string;
  alive: boolean;
  responseMs: number;
  layerCount: number;
  error: string | null;
  /** ISO timestamp of the probe */
  checkedAt: string;
}

export interface HealthCache {
  get(url: string): HealthReport | null;
  set(report: HealthReport): void;
}

export function isFresh(report: HealthReport, maxAgeMs: number, now: number = Date.now()): boolean {
  return now - new Date(report.checkedAt).getTime() <= maxAgeMs;
}

// ============================================================================
// In-memory
// ============================================================================

export class MemoryHealthCache implements HealthCache {
  private readonly reports = new Map<string, HealthReport>();

  get(url: string): HealthReport | null {
    return this.reports.get(url) ?? null;
  }

  set(report: HealthReport): void {
    this.reports.set(report.url, report);
  }

  get size(): number {
    return this.reports.size;
  }

  clear(): void {
    this.reports.clear();
  }
}

// ============================================================================
// SQLite
// ============================================================================

interface HealthRow {
  url: string;
  alive: number;
  response_ms: number;
  layer_count: number;
  error: string | null;
  checked_at: string;
}

export class SqliteHealthCache implements HealthCache {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS service_health (
        url TEXT PRIMARY KEY,
        alive INTEGER NOT NULL,
        response_ms INTEGER NOT NULL,
        layer_count INTEGER NOT NULL DEFAULT 0,
        error TEXT,
        checked_at TEXT NOT NULL
      );
    `);
  }

  get(url: string): HealthReport | null {
    const row = this.db
      .prepare<[string], HealthRow>(
        `SELECT url, alive, response_ms, layer_count, error, checked_at
         FROM service_health WHERE url = ?`
      )
      .get(url);

    if (!row) return null;

    return {
      url: row.url,
      alive: row.alive === 1,
      responseMs: row.response_ms,
      layerCount: row.layer_count,
      error: row.error,
      checkedAt: row.checked_at,
    };
  }

  set(report: HealthReport): void {
    this.db
      .prepare(
        `INSERT INTO service_health (url, alive, response_ms, layer_count, error, checked_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(url) DO UPDATE SET
           alive = excluded.alive,
           response_ms = excluded.response_ms,
           layer_count = excluded.layer_count,
           error = excluded.error,
           checked_at = excluded.checked_at`
      )
      .run(
        report.url,
        report.alive ? 1 : 0,
        report.responseMs,
        report.layerCount,
        report.error,
        report.checkedAt
      );
  }

  /**
   * Drop reports older than `maxAgeMs`. Returns the number removed.
   */
  prune(maxAgeMs: number, now: number = Date.now()): number {
    const cutoff = new Date(now - maxAgeMs).toISOString();
    return this.db.prepare(`DELETE FROM service_health WHERE checked_at < ?`).run(cutoff).changes;
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM service_health`)
      .get();
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Open a SQLite cache, creating its directory first.
 */
export async function openHealthCache(dbPath: string): Promise<SqliteHealthCache> {
  await mkdir(dirname(dbPath), { recursive: true });
  return new SqliteHealthCache(dbPath);
}
