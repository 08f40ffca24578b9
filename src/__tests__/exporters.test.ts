import { describe, it, expect, beforeEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { exportPoints, exportRun, exportUnresolved } from '../exporters/export.js';
import { CiteGeoDatabase } from '../storage/database.js';
import type { AggregationResult } from '../types/index.js';
import { makeTempDir } from './fakes.js';

const RESULT: AggregationResult = {
    points: [
        { canonicalLocation: 'Paris, France', latitude: 48.8566, longitude: 2.3522, count: 2 },
        { canonicalLocation: 'Zurich, Switzerland', latitude: 47.3769, longitude: 8.5417, count: 1 },
    ],
    unresolved: ['Unknown Institute XYZ'],
};

describe('exporters', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    describe('exportPoints', () => {
        it('should write JSON with points and unresolved strings', () => {
            const out = join(dir, 'points.json');
            exportPoints(RESULT, out, 'json');

            const document = JSON.parse(readFileSync(out, 'utf-8'));
            expect(document.citegeo.version).toBe('1.0.0');
            expect(document.points).toEqual(RESULT.points);
            expect(document.unresolved).toEqual(['Unknown Institute XYZ']);
        });

        it('should write CSV rows in point order', () => {
            const out = join(dir, 'points.csv');
            exportPoints(RESULT, out, 'csv');

            expect(readFileSync(out, 'utf-8')).toBe(
                'canonical_location,latitude,longitude,count\n' +
                '"Paris, France",48.8566,2.3522,2\n' +
                '"Zurich, Switzerland",47.3769,8.5417,1\n'
            );
        });

        it('should write GeoJSON with [longitude, latitude] positions', () => {
            const out = join(dir, 'nested', 'points.geojson');
            exportPoints(RESULT, out, 'geojson');

            const document = JSON.parse(readFileSync(out, 'utf-8'));
            expect(document.type).toBe('FeatureCollection');
            expect(document.features).toHaveLength(2);
            expect(document.features[0]).toEqual({
                type: 'Feature',
                geometry: { type: 'Point', coordinates: [2.3522, 48.8566] },
                properties: { name: 'Paris, France', count: 2 },
            });
        });
    });

    describe('exportUnresolved', () => {
        it('should write sorted, deduplicated lines', () => {
            const out = join(dir, 'unresolved.txt');
            exportUnresolved(['Zeta Lab', 'Alpha Lab', 'Zeta Lab'], out);

            expect(readFileSync(out, 'utf-8')).toBe('Alpha Lab\nZeta Lab\n');
        });

        it('should write an empty file when nothing is unresolved', () => {
            const out = join(dir, 'unresolved.txt');
            exportUnresolved([], out);

            expect(readFileSync(out, 'utf-8')).toBe('');
        });
    });

    describe('exportRun', () => {
        it('should export the latest stored run', () => {
            const dbPath = join(dir, 'history.db');
            const db = new CiteGeoDatabase(dbPath);
            db.recordRun(
                { created_at: '2024-05-01T12:00:00.000Z', citegeo_version: '1.0.0', config_json: '{}', input: 'a.csv', stats_json: '{}' },
                { points: [], unresolved: [] }
            );
            const latest = db.recordRun(
                { created_at: '2024-05-02T12:00:00.000Z', citegeo_version: '1.0.0', config_json: '{}', input: 'b.csv', stats_json: '{}' },
                RESULT
            );
            db.close();

            const out = join(dir, 'export.csv');
            expect(exportRun(dbPath, out, 'csv')).toBe(latest);
            expect(readFileSync(out, 'utf-8').split('\n')[1]).toBe('"Paris, France",48.8566,2.3522,2');
        });

        it('should fail when there is nothing to export', () => {
            const dbPath = join(dir, 'empty.db');

            expect(() => exportRun(dbPath, join(dir, 'out.json'), 'json')).toThrow(`No runs stored in ${dbPath}`);
            expect(() => exportRun(dbPath, join(dir, 'out.json'), 'json', 7)).toThrow(`Run 7 not found in ${dbPath}`);
        });
    });
});
