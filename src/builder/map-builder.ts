import type {
    AggregationResult,
    CiteGeoConfig,
    GeocoderAdapter,
    ResolutionRecord,
    ResolutionStats,
} from '../types/index.js';
import { ResolutionCache } from '../cache/resolution-cache.js';
import { createGeocoder } from '../geocoding/index.js';
import { AliasTable, loadAliasTable } from '../resolve/alias-table.js';
import { aggregate } from '../resolve/aggregator.js';
import { ResolutionPipeline } from '../resolve/pipeline.js';
import { readReviewSheet } from '../review/review-sheet.js';
import { readAffiliations } from '../sources/affiliation-input.js';
import { CiteGeoDatabase } from '../storage/database.js';
import { exportPoints, exportUnresolved } from '../exporters/export.js';
import { ConfigError } from '../utils/errors.js';
import { getComponentLogger } from '../utils/logger.js';

export const CITEGEO_VERSION = '1.0.0';

/**
 * Collaborators that tests (or embedding code) may supply instead of building them from config.
 */
export interface MapBuildDeps {
    geocoder?: GeocoderAdapter;
    aliases?: AliasTable;
}

export interface ResolvedInput {
    records: Map<string, ResolutionRecord>;
    occurrences: Map<string, number>;
    stats: ResolutionStats;
    overridesApplied: number;
}

export interface MapBuildResult extends ResolvedInput {
    result: AggregationResult;
    runId?: number;
}

/**
 * Build the pipeline for a config: cache, alias table, geocoder.
 *
 * @throws ConfigError on a malformed alias table or missing geocoder credentials
 * @throws CachePersistenceError if the cache file cannot be read
 */
export function createPipeline(config: CiteGeoConfig, deps: MapBuildDeps = {}): ResolutionPipeline {
    return new ResolutionPipeline({
        cache: new ResolutionCache({ path: config.cache }),
        aliases: deps.aliases ?? loadAliasTable(config.aliases),
        geocoder: deps.geocoder ?? createGeocoder(config.geocoder),
    });
}

/**
 * Stages 1 and 2: read the input's raw affiliations, fold in review-sheet corrections,
 * and resolve every distinct string.
 */
export async function resolveInput(config: CiteGeoConfig, deps: MapBuildDeps = {}): Promise<ResolvedInput> {
    if (!config.input) {
        throw new ConfigError('No input file given (use --input or set "input" in citegeo.config.json)');
    }

    const { occurrences } = readAffiliations(config.input, { column: config.column });
    const pipeline = createPipeline(config, deps);

    let overridesApplied = 0;
    if (config.review) {
        const sheet = readReviewSheet(config.review);
        overridesApplied = pipeline.applyOverrides(sheet.records);
    }

    const records = await pipeline.resolve(occurrences.keys(), { refresh: config.refresh });
    return { records, occurrences, stats: { ...pipeline.lastStats }, overridesApplied };
}

/**
 * Full run: resolve the input, aggregate into points, write outputs,
 * and record the run when a database path is configured.
 *
 * Per-affiliation failures end up in the unresolved list; only configuration and
 * cache persistence errors abort the run.
 */
export async function buildMap(config: CiteGeoConfig, deps: MapBuildDeps = {}): Promise<MapBuildResult> {
    const logger = getComponentLogger('builder');
    const startTime = Date.now();

    const resolved = await resolveInput(config, deps);

    const result = aggregate(
        resolved.records,
        config.countBy === 'occurrences' ? { occurrences: resolved.occurrences } : {}
    );

    exportPoints(result, config.out, config.format);
    exportUnresolved(result.unresolved, config.unresolvedOut);

    let runId: number | undefined;
    if (config.db) {
        const db = new CiteGeoDatabase(config.db);
        try {
            runId = db.recordRun(
                {
                    created_at: new Date().toISOString(),
                    citegeo_version: CITEGEO_VERSION,
                    config_json: JSON.stringify({ ...config, geocoder: { ...config.geocoder, apiKey: undefined } }),
                    input: config.input ?? '',
                    stats_json: JSON.stringify({
                        ...resolved.stats,
                        points: result.points.length,
                        overridesApplied: resolved.overridesApplied,
                    }),
                },
                result
            );
        } finally {
            db.close();
        }
    }

    logger.info(
        {
            points: result.points.length,
            unresolved: result.unresolved.length,
            runId,
            elapsedMs: Date.now() - startTime,
        },
        'Map data built'
    );

    return { ...resolved, result, runId };
}
