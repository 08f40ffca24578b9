import type { AggregatedPoint, AggregationResult, ResolutionRecord } from '../types/index.js';
import { normalize } from './normalizer.js';

export interface AggregateOptions {
    /**
     * Number of citing records each raw affiliation appeared in. When given, a point's
     * count is the sum of its raw strings' occurrences (a raw string missing from the map
     * counts once, an explicit 0 drops it); otherwise each distinct raw affiliation counts once.
     */
    occurrences?: ReadonlyMap<string, number>;
}

/**
 * Group resolved records by canonical location and count contributors.
 *
 * Locations compare by normalized key, so "Paris, France" and "paris, france" form one
 * point; its label and coordinates come from the first contributing raw string in sorted
 * order. Points are ordered by count (descending), then label.
 */
export function aggregate(
    records: ReadonlyMap<string, ResolutionRecord>,
    options: AggregateOptions = {}
): AggregationResult {
    const { occurrences } = options;
    const points = new Map<string, AggregatedPoint>();
    const unresolved = new Set<string>();

    const raws = [...records.keys()].sort();
    for (const raw of raws) {
        const record = records.get(raw);
        if (!record) continue;

        if (
            record.status !== 'resolved' ||
            record.canonicalLocation === undefined ||
            record.latitude === undefined ||
            record.longitude === undefined
        ) {
            unresolved.add(raw);
            continue;
        }

        const weight = occurrences?.get(raw) ?? 1;
        if (weight <= 0) continue;

        const locationKey = normalize(record.canonicalLocation);
        const existing = points.get(locationKey);
        if (existing) {
            existing.count += weight;
        } else {
            points.set(locationKey, {
                canonicalLocation: record.canonicalLocation,
                latitude: record.latitude,
                longitude: record.longitude,
                count: weight,
            });
        }
    }

    return {
        points: [...points.values()].sort(
            (a, b) => b.count - a.count || a.canonicalLocation.localeCompare(b.canonicalLocation)
        ),
        unresolved: [...unresolved],
    };
}
