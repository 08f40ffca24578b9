/**
 * Normalized lookup key derived from a raw affiliation string by `normalize()`.
 */
export type AffiliationKey = string;

export type ResolutionStatus = 'resolved' | 'unresolved';

/**
 * Where a record came from in the current run.
 * `cache` also marks manually corrected entries fed back from a review sheet.
 */
export type ResolutionSource = 'alias' | 'cache' | 'geocoder';

/**
 * Outcome of resolving one affiliation key.
 * Resolved records always carry a canonical location and both coordinates.
 */
export interface ResolutionRecord {
    key: AffiliationKey;
    status: ResolutionStatus;
    canonicalLocation?: string;
    latitude?: number;
    longitude?: number;
    source: ResolutionSource;
}

/**
 * One map point: a distinct canonical location and how many affiliations landed on it.
 */
export interface AggregatedPoint {
    canonicalLocation: string;
    latitude: number;
    longitude: number;
    count: number;
}

export interface AggregationResult {
    points: AggregatedPoint[];
    /** Raw strings (verbatim) whose key ended unresolved, sorted. */
    unresolved: string[];
}

/**
 * Counters for a single pipeline run.
 */
export interface ResolutionStats {
    inputs: number;
    uniqueKeys: number;
    cacheHits: number;
    aliasHits: number;
    geocoded: number;
    unresolved: number;
}

export type RefreshMode = 'none' | 'unresolved' | 'all';
