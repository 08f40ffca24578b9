import { vi } from 'vitest';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GeocodeError } from '../types/index.js';
import type { GeocodeErrorCode, GeocodeMatch, GeocodeResult, GeocoderAdapter, RetryPolicy } from '../types/index.js';

/**
 * Geocoder double: answers from a fixed table and records every query.
 */
export class FakeGeocoder implements GeocoderAdapter {
    readonly name = 'Fake';
    readonly calls: string[] = [];

    constructor(
        private readonly answers: Record<string, GeocodeMatch> = {},
        private readonly failure: GeocodeErrorCode = 'not_found'
    ) {}

    async geocode(query: string): Promise<GeocodeResult> {
        this.calls.push(query);
        const match = this.answers[query];
        return match
            ? { ok: true, match }
            : { ok: false, error: new GeocodeError(`No match for "${query}"`, this.failure, query) };
    }
}

export function match(canonicalLocation: string, latitude: number, longitude: number): GeocodeMatch {
    return { canonicalLocation, latitude, longitude, confidence: 0.9 };
}

export const FAST_RETRY: RetryPolicy = { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 };

export const UNTHROTTLED = {
    default: { tokensPerSecond: 1000, maxBurst: 1000 },
    nominatim: { tokensPerSecond: 1000, maxBurst: 1000 },
    locationiq: { tokensPerSecond: 1000, maxBurst: 1000 },
};

/**
 * Minimal stand-in for a fetch Response.
 */
export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}) {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText: status === 200 ? 'OK' : `Status ${status}`,
        headers: new Map(Object.entries({ 'content-type': 'application/json', ...headers })),
        json: async () => body,
        text: async () => JSON.stringify(body),
    };
}

export function stubFetch(...responses: Array<ReturnType<typeof jsonResponse> | Error>) {
    const mockFetch = vi.fn();
    for (const response of responses) {
        if (response instanceof Error) {
            mockFetch.mockRejectedValueOnce(response);
        } else {
            mockFetch.mockResolvedValueOnce(response);
        }
    }
    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}

export function makeTempDir(): string {
    return mkdtempSync(join(tmpdir(), 'citegeo-test-'));
}
