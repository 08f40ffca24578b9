import type {
    AffiliationKey,
    GeocoderAdapter,
    RefreshMode,
    ResolutionRecord,
    ResolutionStats,
} from '../types/index.js';
import type { ResolutionCache } from '../cache/resolution-cache.js';
import { getComponentLogger } from '../utils/logger.js';
import type { AliasTable } from './alias-table.js';
import { normalize } from './normalizer.js';

export interface ResolutionPipelineDeps {
    cache: ResolutionCache;
    aliases: AliasTable;
    geocoder: GeocoderAdapter;
}

export interface ResolveOptions {
    /**
     * Clear matching cache entries for this batch before resolving:
     * `unresolved` retries past failures, `all` re-resolves everything.
     * Entries applied through `applyOverrides()` are kept either way.
     */
    refresh?: RefreshMode;
}

/**
 * Resolves raw affiliation strings to locations, one unique key at a time:
 *
 * 1. Cache hit → reuse (no network)
 * 2. Alias hit → canonical location from the alias table
 * 3. Otherwise → geocode the raw string
 *
 * Every outcome of steps 2 and 3, failures included, is written to the cache, so a key
 * is geocoded at most once per run and an unresolved key stays unresolved until refreshed.
 * Keys run in sorted order; a geocoding failure affects only its own key.
 */
export class ResolutionPipeline {
    private readonly cache: ResolutionCache;
    private readonly aliases: AliasTable;
    private readonly geocoder: GeocoderAdapter;
    private stats: ResolutionStats = emptyStats();

    constructor(deps: ResolutionPipelineDeps) {
        this.cache = deps.cache;
        this.aliases = deps.aliases;
        this.geocoder = deps.geocoder;
    }

    /**
     * Resolve a batch of raw affiliation strings.
     * Returns one record per distinct raw string; raw strings sharing a key share the record.
     *
     * @throws CachePersistenceError if a cache write fails
     */
    async resolve(rawAffiliations: Iterable<string>, options: ResolveOptions = {}): Promise<Map<string, ResolutionRecord>> {
        const logger = getComponentLogger('pipeline');
        const { refresh = 'none' } = options;

        const groups = groupByKey(rawAffiliations);
        const keys = [...groups.keys()].sort();
        const stats = emptyStats();
        stats.uniqueKeys = keys.length;

        if (refresh !== 'none') {
            const cleared = this.clearForRefresh(keys, refresh);
            logger.info({ refresh, cleared }, 'Cleared cache entries for refresh');
        }

        const results = new Map<string, ResolutionRecord>();

        for (const key of keys) {
            const raws = groups.get(key) ?? [];
            stats.inputs += raws.length;

            const record = await this.resolveKey(key, raws, stats);
            if (record.status === 'unresolved') {
                stats.unresolved++;
                logger.warn({ key, raw: raws }, 'Affiliation unresolved');
            }

            for (const raw of raws) {
                results.set(raw, record);
            }
        }

        this.stats = stats;
        logger.info(stats, 'Resolution complete');
        return results;
    }

    /**
     * Feed externally edited records (e.g. from a review sheet) into the cache so the
     * next `resolve()` picks them up as cache hits, overriding automatic resolution.
     * Records that match the current cache entry are left as they are.
     *
     * @throws CachePersistenceError if a cache write fails
     */
    applyOverrides(records: Iterable<ResolutionRecord>): number {
        return applyOverrides(this.cache, records);
    }

    /**
     * Counters from the most recent `resolve()` call.
     */
    get lastStats(): Readonly<ResolutionStats> {
        return this.stats;
    }

    private async resolveKey(key: AffiliationKey, raws: string[], stats: ResolutionStats): Promise<ResolutionRecord> {
        const logger = getComponentLogger('pipeline');

        const cached = this.cache.get(key);
        if (cached) {
            stats.cacheHits++;
            logger.debug({ key, status: cached.status }, 'Cache hit');
            return { ...cached, source: 'cache' };
        }

        let record: ResolutionRecord;
        const alias = this.aliases.lookup(key);

        if (alias) {
            stats.aliasHits++;
            if (alias.latitude !== undefined && alias.longitude !== undefined) {
                record = {
                    key,
                    status: 'resolved',
                    canonicalLocation: alias.canonicalLocation,
                    latitude: alias.latitude,
                    longitude: alias.longitude,
                    source: 'alias',
                };
            } else {
                // Alias without coordinates: geocode the canonical name, keep the alias label
                stats.geocoded++;
                const result = await this.geocoder.geocode(alias.canonicalLocation);
                record = result.ok
                    ? {
                        key,
                        status: 'resolved',
                        canonicalLocation: alias.canonicalLocation,
                        latitude: result.match.latitude,
                        longitude: result.match.longitude,
                        source: 'alias',
                    }
                    : { key, status: 'unresolved', canonicalLocation: alias.canonicalLocation, source: 'alias' };
                if (!result.ok) {
                    logger.warn({ key, code: result.error.code, error: result.error.message }, 'Alias location could not be geocoded');
                }
            }
            logger.debug({ key, canonicalLocation: alias.canonicalLocation }, 'Alias hit');
        } else if (!key) {
            // Nothing left after normalization; no point asking the geocoder
            record = { key, status: 'unresolved', source: 'geocoder' };
        } else {
            stats.geocoded++;
            const query = raws[0] ?? key;
            const result = await this.geocoder.geocode(query);
            if (result.ok) {
                record = {
                    key,
                    status: 'resolved',
                    canonicalLocation: result.match.canonicalLocation,
                    latitude: result.match.latitude,
                    longitude: result.match.longitude,
                    source: 'geocoder',
                };
            } else {
                logger.debug({ key, query, code: result.error.code, error: result.error.message }, 'Geocoding failed');
                record = { key, status: 'unresolved', source: 'geocoder' };
            }
        }

        this.cache.put(key, record);
        return record;
    }

    private clearForRefresh(keys: AffiliationKey[], refresh: Exclude<RefreshMode, 'none'>): number {
        let cleared = 0;
        for (const key of keys) {
            const cached = this.cache.get(key);
            // Manual corrections are never refreshed away
            if (!cached || cached.source === 'cache') continue;
            if (refresh === 'all' || cached.status === 'unresolved') {
                this.cache.delete(key);
                cleared++;
            }
        }
        return cleared;
    }
}

/**
 * Store reviewed records as manual cache entries (source `cache`), which refresh never clears.
 *
 * Rows that still match the cached resolution were left alone by the reviewer and keep
 * their cache entry, so they stay refreshable. A bare unresolved row with no cache entry
 * carries no correction and is skipped as well. Returns the number of records applied.
 */
export function applyOverrides(cache: ResolutionCache, records: Iterable<ResolutionRecord>): number {
    let applied = 0;
    let unchanged = 0;
    for (const record of records) {
        const existing = cache.get(record.key);
        const untouched = existing
            ? sameResolution(existing, record)
            : record.status === 'unresolved' && record.canonicalLocation === undefined;
        if (untouched) {
            unchanged++;
            continue;
        }

        cache.put(record.key, { ...record, source: 'cache' });
        applied++;
    }
    getComponentLogger('pipeline').info({ applied, unchanged }, 'Applied manual overrides');
    return applied;
}

function sameResolution(a: ResolutionRecord, b: ResolutionRecord): boolean {
    return (
        a.status === b.status &&
        a.canonicalLocation === b.canonicalLocation &&
        a.latitude === b.latitude &&
        a.longitude === b.longitude
    );
}

/**
 * Dedupe raw strings and group them by normalized key.
 * Raw strings within a group are sorted, so the geocoding query for a key is stable.
 */
export function groupByKey(rawAffiliations: Iterable<string>): Map<AffiliationKey, string[]> {
    const groups = new Map<AffiliationKey, Set<string>>();
    for (const raw of rawAffiliations) {
        const key = normalize(raw);
        let group = groups.get(key);
        if (!group) {
            group = new Set();
            groups.set(key, group);
        }
        group.add(raw);
    }

    return new Map([...groups].map(([key, raws]) => [key, [...raws].sort()]));
}

function emptyStats(): ResolutionStats {
    return { inputs: 0, uniqueKeys: 0, cacheHits: 0, aliasHits: 0, geocoded: 0, unresolved: 0 };
}
