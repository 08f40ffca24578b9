import { describe, it, expect } from 'vitest';
import { aggregate } from '../resolve/aggregator.js';
import type { ResolutionRecord } from '../types/index.js';

function resolved(key: string, canonicalLocation: string, latitude: number, longitude: number): ResolutionRecord {
    return { key, status: 'resolved', canonicalLocation, latitude, longitude, source: 'geocoder' };
}

describe('aggregate', () => {
    const paris = new Map<string, ResolutionRecord>([
        ['Ecole Normale Superieure', resolved('ecole normale superieure', 'Paris, France', 48.8566, 2.3522)],
        ['Sorbonne', resolved('sorbonne', 'paris, france', 48.85, 2.35)],
        ['Atlantis Institute', { key: 'atlantis institute', status: 'unresolved', source: 'geocoder' }],
    ]);

    it('should merge locations that differ only in case', () => {
        expect(aggregate(paris)).toEqual({
            points: [{ canonicalLocation: 'Paris, France', latitude: 48.8566, longitude: 2.3522, count: 2 }],
            unresolved: ['Atlantis Institute'],
        });
    });

    it('should sum occurrences when given', () => {
        const occurrences = new Map([
            ['Ecole Normale Superieure', 3],
            ['Sorbonne', 2],
            ['Atlantis Institute', 4],
        ]);

        expect(aggregate(paris, { occurrences }).points).toEqual([
            { canonicalLocation: 'Paris, France', latitude: 48.8566, longitude: 2.3522, count: 5 },
        ]);
    });

    it('should count raw strings missing from the occurrences once', () => {
        const occurrences = new Map([['Sorbonne', 4]]);

        expect(aggregate(paris, { occurrences }).points).toEqual([
            { canonicalLocation: 'Paris, France', latitude: 48.8566, longitude: 2.3522, count: 5 },
        ]);
    });

    it('should drop raw strings with zero occurrences', () => {
        const occurrences = new Map([['Ecole Normale Superieure', 0], ['Sorbonne', 0]]);

        expect(aggregate(paris, { occurrences })).toEqual({ points: [], unresolved: ['Atlantis Institute'] });
    });

    it('should order points by count, then label', () => {
        const records = new Map<string, ResolutionRecord>([
            ['TU Berlin', resolved('tu berlin', 'Berlin, Germany', 52.52, 13.405)],
            ['UT Austin', resolved('ut austin', 'Austin, USA', 30.2672, -97.7431)],
            ['ENS', resolved('ens', 'Paris, France', 48.8566, 2.3522)],
            ['Sorbonne', resolved('sorbonne', 'Paris, France', 48.8566, 2.3522)],
        ]);

        expect(aggregate(records).points.map((point) => [point.canonicalLocation, point.count])).toEqual([
            ['Paris, France', 2],
            ['Austin, USA', 1],
            ['Berlin, Germany', 1],
        ]);
    });

    it('should treat resolved records missing coordinates as unresolved', () => {
        const records = new Map<string, ResolutionRecord>([
            ['Broken Entry', { key: 'broken entry', status: 'resolved', canonicalLocation: 'Somewhere', source: 'cache' }],
        ]);

        expect(aggregate(records)).toEqual({ points: [], unresolved: ['Broken Entry'] });
    });

    it('should return sorted unresolved raw strings', () => {
        const records = new Map<string, ResolutionRecord>([
            ['Zeta Lab', { key: 'zeta lab', status: 'unresolved', source: 'geocoder' }],
            ['Alpha Lab', { key: 'alpha lab', status: 'unresolved', source: 'geocoder' }],
        ]);

        expect(aggregate(records).unresolved).toEqual(['Alpha Lab', 'Zeta Lab']);
    });
});
