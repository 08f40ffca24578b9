/**
 * Best match returned by a geocoder for one query.
 */
export interface GeocodeMatch {
    latitude: number;
    longitude: number;
    /** "City, Country" label for the match */
    canonicalLocation: string;
    /** Provider confidence, 0.0 to 1.0 */
    confidence: number;
}

export type GeocodeErrorCode = 'not_found' | 'transient' | 'provider';

/**
 * Terminal geocoding failure. `transient` means retries were exhausted.
 */
export class GeocodeError extends Error {
    constructor(
        message: string,
        public readonly code: GeocodeErrorCode,
        public readonly query: string
    ) {
        super(message);
        this.name = 'GeocodeError';
    }
}

export type GeocodeResult =
    | { ok: true; match: GeocodeMatch }
    | { ok: false; error: GeocodeError };

/**
 * Interface for geocoding backends.
 * Implementations absorb per-query failures into `{ ok: false }` and never write to the cache.
 */
export interface GeocoderAdapter {
    /** Human-readable provider name */
    readonly name: string;

    /**
     * Look up a place name or raw affiliation and return the single best match.
     */
    geocode(query: string): Promise<GeocodeResult>;
}
