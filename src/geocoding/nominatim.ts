import { z } from 'zod';
import type { GeocodeMatch, GeocodeResult, GeocoderAdapter, GeocoderProvider, RetryPolicy } from '../types/index.js';
import { GeocodeError } from '../types/index.js';
import { HttpClient, HttpError, DEFAULT_RETRY_POLICY } from '../utils/http-client.js';
import { getComponentLogger } from '../utils/logger.js';

const BASE_URLS: Record<GeocoderProvider, string> = {
    nominatim: 'https://nominatim.openstreetmap.org',
    locationiq: 'https://us1.locationiq.com/v1',
};

/**
 * Nominatim search result (subset of relevant fields).
 * LocationIQ returns the same shape.
 */
const searchResultSchema = z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
    importance: z.coerce.number().optional(),
    address: z
        .object({
            city: z.string().optional(),
            town: z.string().optional(),
            village: z.string().optional(),
            municipality: z.string().optional(),
            county: z.string().optional(),
            state: z.string().optional(),
            country: z.string().optional(),
        })
        .optional(),
});

type SearchResult = z.infer<typeof searchResultSchema>;

export interface NominatimGeocoderOptions {
    provider?: GeocoderProvider;
    baseUrl?: string;
    apiKey?: string;
    email?: string;
    timeoutMs?: number;
    retry?: RetryPolicy;
    /** For dependency injection in tests */
    httpClient?: HttpClient;
}

/**
 * Geocoder backed by a Nominatim-compatible search API: the public OpenStreetMap
 * instance or LocationIQ.
 *
 * Rate limiting and retries come from the shared HttpClient; transient failures that
 * outlast the retry policy come back as `{ ok: false }` with code `transient`.
 *
 * @see https://nominatim.org/release-docs/latest/api/Search/
 */
export class NominatimGeocoder implements GeocoderAdapter {
    readonly name: string;
    private readonly provider: GeocoderProvider;
    private readonly baseUrl: string;
    private readonly apiKey?: string;
    private readonly timeoutMs: number;
    private readonly retry: RetryPolicy;
    private readonly httpClient: HttpClient;

    constructor(options: NominatimGeocoderOptions = {}) {
        this.provider = options.provider ?? 'nominatim';
        this.name = this.provider === 'locationiq' ? 'LocationIQ' : 'Nominatim';
        this.baseUrl = (options.baseUrl ?? BASE_URLS[this.provider]).replace(/\/+$/, '');
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.httpClient = options.httpClient ?? new HttpClient({ email: options.email, retry: this.retry });
    }

    async geocode(query: string): Promise<GeocodeResult> {
        const logger = getComponentLogger('geocoder');
        const trimmed = query.trim();
        if (!trimmed) {
            return { ok: false, error: new GeocodeError('Empty query', 'not_found', query) };
        }

        const params = new URLSearchParams({
            q: trimmed,
            format: this.provider === 'locationiq' ? 'json' : 'jsonv2',
            addressdetails: '1',
            limit: '5',
        });
        if (this.apiKey) params.set('key', this.apiKey);

        const url = `${this.baseUrl}/search?${params.toString()}`;
        logger.debug({ query: trimmed, provider: this.provider }, 'Geocoding');

        let data: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: this.provider,
                timeout: this.timeoutMs,
                retry: this.retry,
            });
            data = response.data;
        } catch (error) {
            return { ok: false, error: this.classifyError(error, trimmed) };
        }

        const results = z.array(searchResultSchema).safeParse(data);
        if (!results.success) {
            return {
                ok: false,
                error: new GeocodeError(`Unexpected ${this.name} response for "${trimmed}"`, 'provider', trimmed),
            };
        }

        const best = pickBest(results.data);
        if (!best) {
            return { ok: false, error: new GeocodeError(`No match for "${trimmed}"`, 'not_found', trimmed) };
        }

        const match: GeocodeMatch = {
            latitude: best.lat,
            longitude: best.lon,
            canonicalLocation: formatLocationLabel(best) ?? trimmed,
            confidence: Math.min(best.importance ?? 0.5, 1),
        };
        logger.debug({ query: trimmed, match }, 'Geocoded');
        return { ok: true, match };
    }

    private classifyError(error: unknown, query: string): GeocodeError {
        if (error instanceof HttpError) {
            // LocationIQ answers an empty search with 404
            if (error.status === 404) {
                return new GeocodeError(`No match for "${query}"`, 'not_found', query);
            }
            return new GeocodeError(error.message, error.retryable ? 'transient' : 'provider', query);
        }
        return new GeocodeError(error instanceof Error ? error.message : String(error), 'provider', query);
    }
}

/**
 * Highest-importance result; the first one wins ties.
 */
function pickBest(results: SearchResult[]): SearchResult | undefined {
    let best: SearchResult | undefined;
    for (const result of results) {
        if (!Number.isFinite(result.lat) || !Number.isFinite(result.lon)) continue;
        if (!best || (result.importance ?? 0) > (best.importance ?? 0)) {
            best = result;
        }
    }
    return best;
}

/**
 * "City, Country" label from address details, falling back to
 * "State, Country", the country, then the display name.
 */
export function formatLocationLabel(result: SearchResult): string | null {
    const address = result.address ?? {};
    const city = address.city ?? address.town ?? address.village ?? address.municipality ?? address.county;
    const { state, country } = address;

    if (city && country) return `${city}, ${country}`;
    if (state && country) return `${state}, ${country}`;
    if (city) return city;
    if (country) return country;
    return result.display_name ?? null;
}
