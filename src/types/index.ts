/**
 * Barrel export for all shared types.
 */
export type {
    AffiliationKey,
    ResolutionStatus,
    ResolutionSource,
    ResolutionRecord,
    AggregatedPoint,
    AggregationResult,
    ResolutionStats,
    RefreshMode,
} from './resolution.js';
export { GeocodeError } from './geocoder.js';
export type { GeocodeMatch, GeocodeErrorCode, GeocodeResult, GeocoderAdapter } from './geocoder.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CiteGeoConfig,
    LogLevel,
    OutputFormat,
    CountMode,
    GeocoderProvider,
    GeocoderConfig,
    RetryPolicy,
    RunRecord,
} from './config.js';
