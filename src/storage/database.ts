import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { AggregatedPoint, AggregationResult, RunRecord } from '../types/index.js';
import { getComponentLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Run history: one row per `map` run plus the points and unresolved strings it produced.
 */
const MIGRATION_V1 = `
-- Runs: map session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  citegeo_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  input TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Points: aggregated locations per run
CREATE TABLE IF NOT EXISTS points (
  point_id INTEGER PRIMARY KEY,
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  canonical_location TEXT NOT NULL,
  latitude REAL NOT NULL,
  longitude REAL NOT NULL,
  count INTEGER NOT NULL CHECK (count >= 1)
);

-- Unresolved raw affiliations per run
CREATE TABLE IF NOT EXISTS unresolved (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  raw TEXT NOT NULL,
  PRIMARY KEY (run_id, raw)
);

CREATE INDEX IF NOT EXISTS idx_points_run ON points(run_id);
`;

interface PointRow {
    canonical_location: string;
    latitude: number;
    longitude: number;
    count: number;
}

/**
 * Run history database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, and foreign keys.
 */
export class CiteGeoDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getComponentLogger('database').debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getComponentLogger('database').info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a run together with its points and unresolved strings in one transaction.
     * Returns the new run ID.
     */
    recordRun(run: Omit<RunRecord, 'run_id'>, result: AggregationResult): number {
        const runStmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, citegeo_version, config_json, input, stats_json)
      VALUES (@created_at, @citegeo_version, @config_json, @input, @stats_json)
    `);
        const pointStmt = this.db.prepare<[number, string, number, number, number]>(`
      INSERT INTO points (run_id, canonical_location, latitude, longitude, count)
      VALUES (?, ?, ?, ?, ?)
    `);
        const unresolvedStmt = this.db.prepare<[number, string]>(`
      INSERT OR IGNORE INTO unresolved (run_id, raw) VALUES (?, ?)
    `);

        const insertAll = this.db.transaction(() => {
            const runId = Number(runStmt.run(run).lastInsertRowid);
            for (const point of result.points) {
                pointStmt.run(runId, point.canonicalLocation, point.latitude, point.longitude, point.count);
            }
            for (const raw of result.unresolved) {
                unresolvedStmt.run(runId, raw);
            }
            return runId;
        });

        return insertAll();
    }

    getRun(runId: number): RunRecord | undefined {
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs WHERE run_id = ?').get(runId);
    }

    getLatestRunId(): number | undefined {
        const row = this.db.prepare<[], { run_id: number }>('SELECT run_id FROM runs ORDER BY run_id DESC LIMIT 1').get();
        return row?.run_id;
    }

    getAllRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Points ───────────────────────────────────────────────

    getPoints(runId: number): AggregatedPoint[] {
        const rows = this.db
            .prepare<[number], PointRow>(
                'SELECT canonical_location, latitude, longitude, count FROM points WHERE run_id = ? ORDER BY count DESC, canonical_location'
            )
            .all(runId);

        return rows.map((row) => ({
            canonicalLocation: row.canonical_location,
            latitude: row.latitude,
            longitude: row.longitude,
            count: row.count,
        }));
    }

    getUnresolved(runId: number): string[] {
        return this.db
            .prepare<[number], { raw: string }>('SELECT raw FROM unresolved WHERE run_id = ? ORDER BY raw')
            .all(runId)
            .map((row) => row.raw);
    }

    /**
     * Points and unresolved strings of a stored run, in the shape `aggregate()` returns.
     */
    getResult(runId: number): AggregationResult {
        return { points: this.getPoints(runId), unresolved: this.getUnresolved(runId) };
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): { runs: number; latestRunId: number | null; points: number; unresolved: number; totalCount: number } {
        const count = (sql: string, ...params: number[]): number =>
            this.db.prepare<number[], { value: number | null }>(sql).get(...params)?.value ?? 0;

        const latestRunId = this.getLatestRunId() ?? null;
        if (latestRunId === null) {
            return { runs: 0, latestRunId, points: 0, unresolved: 0, totalCount: 0 };
        }

        return {
            runs: count('SELECT COUNT(*) AS value FROM runs'),
            latestRunId,
            points: count('SELECT COUNT(*) AS value FROM points WHERE run_id = ?', latestRunId),
            unresolved: count('SELECT COUNT(*) AS value FROM unresolved WHERE run_id = ?', latestRunId),
            totalCount: count('SELECT SUM(count) AS value FROM points WHERE run_id = ?', latestRunId),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    close(): void {
        this.db.close();
        getComponentLogger('database').debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
