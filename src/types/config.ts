import type { RefreshMode } from './resolution.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type OutputFormat = 'json' | 'csv' | 'geojson';

/**
 * What a point's count measures: every citing record that names an affiliation
 * (`occurrences`), or each distinct affiliation string once (`distinct`).
 */
export type CountMode = 'occurrences' | 'distinct';

export type GeocoderProvider = 'nominatim' | 'locationiq';

/**
 * Bounded retry policy for transient failures.
 * Delay for attempt n (0-based) is `min(maxDelayMs, baseDelayMs * 2^n)` plus up to `jitter` of that.
 */
export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction of the exponential delay added as random jitter (0 disables) */
    jitter: number;
}

/**
 * Geocoder configuration.
 */
export interface GeocoderConfig {
    provider: GeocoderProvider;
    baseUrl?: string;
    /** Contact address sent in the User-Agent (required by the public Nominatim usage policy) */
    email?: string;
    /** LocationIQ key; read from LOCATIONIQ_API_KEY when not set */
    apiKey?: string;
    timeoutMs: number;
    retry: RetryPolicy;
}

/**
 * Full citegeo configuration merged from CLI flags, env vars, and config file.
 */
export interface CiteGeoConfig {
    // Input
    input?: string;
    /** CSV column holding affiliations: header name or 1-based index */
    column?: string;

    // Resolution
    cache: string;
    aliases?: string;
    review?: string;
    refresh: RefreshMode;
    geocoder: GeocoderConfig;

    // Output
    countBy: CountMode;
    out: string;
    format: OutputFormat;
    unresolvedOut: string;
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CiteGeoConfig = {
    cache: './citegeo-cache.json',
    refresh: 'none',
    geocoder: {
        provider: 'nominatim',
        timeoutMs: 10000,
        retry: {
            maxAttempts: 3,
            baseDelayMs: 1000,
            maxDelayMs: 30000,
            jitter: 0.5,
        },
    },
    countBy: 'occurrences',
    out: './citegeo-points.json',
    format: 'json',
    unresolvedOut: './unresolved.txt',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    citegeo_version: string;
    config_json: string;
    input: string;
    stats_json: string;
}
