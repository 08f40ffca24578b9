import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { CiteGeoDatabase } from '../storage/database.js';
import type { AggregationResult, RunRecord } from '../types/index.js';
import { makeTempDir } from './fakes.js';

const RUN: Omit<RunRecord, 'run_id'> = {
    created_at: '2024-05-01T12:00:00.000Z',
    citegeo_version: '1.0.0',
    config_json: '{}',
    input: 'citations.csv',
    stats_json: '{"inputs":4}',
};

const RESULT: AggregationResult = {
    points: [
        { canonicalLocation: 'Zurich, Switzerland', latitude: 47.3769, longitude: 8.5417, count: 1 },
        { canonicalLocation: 'Cambridge, USA', latitude: 42.3736, longitude: -71.1097, count: 2 },
    ],
    unresolved: ['Unknown Institute XYZ', 'Atlantis Institute'],
};

describe('CiteGeoDatabase', () => {
    let db: CiteGeoDatabase;

    beforeEach(() => {
        db = new CiteGeoDatabase(path.join(makeTempDir(), 'runs', 'history.db'));
    });

    afterEach(() => {
        db.close();
    });

    describe('initialization', () => {
        it('should create the run history tables', () => {
            const tables = db
                .getRawDb()
                .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
                .all();

            expect(tables.map((t) => t.name)).toEqual(['points', 'runs', 'unresolved']);
        });

        it('should set PRAGMA user_version = 1', () => {
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });

        it('should report empty stats', () => {
            expect(db.getStats()).toEqual({ runs: 0, latestRunId: null, points: 0, unresolved: 0, totalCount: 0 });
            expect(db.getLatestRunId()).toBeUndefined();
        });
    });

    describe('runs', () => {
        it('should store a run with its points and unresolved strings', () => {
            const runId = db.recordRun(RUN, RESULT);

            expect(runId).toBe(1);
            expect(db.getRun(runId)).toEqual({ run_id: 1, ...RUN });
            expect(db.getResult(runId)).toEqual({
                points: [
                    { canonicalLocation: 'Cambridge, USA', latitude: 42.3736, longitude: -71.1097, count: 2 },
                    { canonicalLocation: 'Zurich, Switzerland', latitude: 47.3769, longitude: 8.5417, count: 1 },
                ],
                unresolved: ['Atlantis Institute', 'Unknown Institute XYZ'],
            });
        });

        it('should track the latest run', () => {
            db.recordRun(RUN, RESULT);
            const second = db.recordRun({ ...RUN, input: 'more.csv' }, { points: [], unresolved: [] });

            expect(db.getLatestRunId()).toBe(second);
            expect(db.getAllRuns().map((run) => run.input)).toEqual(['citations.csv', 'more.csv']);
        });

        it('should summarize the latest run', () => {
            db.recordRun(RUN, RESULT);

            expect(db.getStats()).toEqual({ runs: 1, latestRunId: 1, points: 2, unresolved: 2, totalCount: 3 });
        });

        it('should cascade deletes to points and unresolved strings', () => {
            const runId = db.recordRun(RUN, RESULT);
            db.getRawDb().prepare('DELETE FROM runs WHERE run_id = ?').run(runId);

            expect(db.getResult(runId)).toEqual({ points: [], unresolved: [] });
        });
    });
});
