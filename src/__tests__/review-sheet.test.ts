import { describe, it, expect, beforeEach } from 'vitest';
import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { readReviewSheet, writeReviewSheet } from '../review/review-sheet.js';
import { ConfigError } from '../utils/errors.js';
import type { ResolutionRecord } from '../types/index.js';
import { makeTempDir } from './fakes.js';

const HEADER = 'raw,key,status,canonical_location,latitude,longitude,source';

describe('review sheet', () => {
    let sheetPath: string;

    beforeEach(() => {
        sheetPath = join(makeTempDir(), 'sheet.csv');
    });

    it('should write one sorted row per raw string', () => {
        const nestedPath = join(makeTempDir(), 'review', 'sheet.csv');
        const records = new Map<string, ResolutionRecord>([
            ['Nowhere Lab', { key: 'nowhere lab', status: 'unresolved', source: 'geocoder' }],
            ['MIT', { key: 'mit', status: 'resolved', canonicalLocation: 'Cambridge, USA', latitude: 42.3736, longitude: -71.1097, source: 'alias' }],
        ]);

        expect(writeReviewSheet(records, nestedPath)).toBe(2);
        expect(readFileSync(nestedPath, 'utf-8')).toBe(
            `${HEADER}\n` +
            'MIT,mit,resolved,"Cambridge, USA",42.3736,-71.1097,alias\n' +
            'Nowhere Lab,nowhere lab,unresolved,,,,geocoder\n'
        );
    });

    it('should read corrected rows as manual records', () => {
        writeFileSync(sheetPath, [
            HEADER,
            'MIT,mit,resolved,"Cambridge, USA",42.3736,-71.1097,alias',
            'Nowhere Lab,nowhere lab,,"Reno, USA",39.5296,-119.8138,geocoder',
            '',
        ].join('\n'));

        const sheet = readReviewSheet(sheetPath);

        expect(sheet.issues).toEqual([]);
        expect(sheet.records).toEqual([
            { key: 'mit', status: 'resolved', canonicalLocation: 'Cambridge, USA', latitude: 42.3736, longitude: -71.1097, source: 'cache' },
            { key: 'nowhere lab', status: 'resolved', canonicalLocation: 'Reno, USA', latitude: 39.5296, longitude: -119.8138, source: 'cache' },
        ]);
    });

    it('should keep rows marked unresolved or lacking coordinates unresolved', () => {
        writeFileSync(sheetPath, [
            HEADER,
            'Acme Labs,acme labs,unresolved,"Boston, USA",42.36,-71.06,geocoder',
            'Atlantis Institute,atlantis institute,resolved,,,,geocoder',
        ].join('\n'));

        expect(readReviewSheet(sheetPath).records).toEqual([
            { key: 'acme labs', status: 'unresolved', canonicalLocation: 'Boston, USA', source: 'cache' },
            { key: 'atlantis institute', status: 'unresolved', source: 'cache' },
        ]);
    });

    it('should report invalid rows and skip them', () => {
        writeFileSync(sheetPath, `${HEADER}\nMIT,mit,resolved,"Cambridge, USA",123,-71.1097,alias\n`);

        const sheet = readReviewSheet(sheetPath);

        expect(sheet.records).toEqual([]);
        expect(sheet.issues).toEqual([{ row: 2, message: 'latitude: must be empty or a number between -90 and 90' }]);
    });

    it('should let the last row for a key win', () => {
        writeFileSync(sheetPath, [
            'raw,canonical_location,latitude,longitude',
            'MIT,"Boston, USA",42.36,-71.06',
            'm.i.t.,"Cambridge, USA",42.3736,-71.1097',
        ].join('\n'));

        const sheet = readReviewSheet(sheetPath);

        expect(sheet.records).toHaveLength(1);
        expect(sheet.records[0]?.canonicalLocation).toBe('Cambridge, USA');
    });

    it('should throw ConfigError when required columns are missing', () => {
        writeFileSync(sheetPath, 'raw,status\nMIT,resolved\n');

        expect(() => readReviewSheet(sheetPath)).toThrow(ConfigError);
    });

    it('should read back what it writes', () => {
        const records = new Map<string, ResolutionRecord>([
            ['ETH Zurich', { key: 'eth zurich', status: 'resolved', canonicalLocation: 'Zurich, Switzerland', latitude: 47.3769, longitude: 8.5417, source: 'geocoder' }],
        ]);
        writeReviewSheet(records, sheetPath);

        expect(readReviewSheet(sheetPath).records).toEqual([
            { key: 'eth zurich', status: 'resolved', canonicalLocation: 'Zurich, Switzerland', latitude: 47.3769, longitude: 8.5417, source: 'cache' },
        ]);
    });
});
