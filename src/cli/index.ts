#!/usr/bin/env node
import { Command, Option } from 'commander';
import { resolveConfig, type CliConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { buildMap, resolveInput, CITEGEO_VERSION } from '../builder/map-builder.js';
import { exportRun, EXPORT_EXTENSIONS } from '../exporters/export.js';
import { readReviewSheet, writeReviewSheet } from '../review/review-sheet.js';
import { ResolutionCache } from '../cache/resolution-cache.js';
import { applyOverrides } from '../resolve/pipeline.js';
import { CiteGeoDatabase } from '../storage/database.js';
import type { CountMode, LogLevel, OutputFormat, RefreshMode } from '../types/index.js';

interface CommonOptions {
    config?: string;
    cache?: string;
    aliases?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    email?: string;
    provider?: 'nominatim' | 'locationiq';
    geocoderUrl?: string;
}

interface MapOptions extends CommonOptions {
    input?: string;
    column?: string;
    review?: string;
    refresh?: RefreshMode;
    countBy?: CountMode;
    format?: OutputFormat;
    out?: string;
    unresolved?: string;
    db?: string;
}

const program = new Command();

program
    .name('citegeo')
    .description('Resolve citing-author affiliations to coordinates and aggregate them into map points.')
    .version(CITEGEO_VERSION);

function withCommonOptions(command: Command): Command {
    return command
        .option('--config <dir>', 'Directory to look for citegeo.config.json in')
        .option('--cache <path>', 'Resolution cache JSON file')
        .option('--aliases <path>', 'Alias table JSON file (defaults to the bundled table)')
        .addOption(new Option('--provider <provider>', 'Geocoder provider').choices(['nominatim', 'locationiq']))
        .option('--geocoder-url <url>', 'Base URL of a Nominatim-compatible service')
        .option('--email <email>', 'Contact email sent to the geocoder')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs');
}

function toCliConfig(opts: MapOptions): CliConfig {
    return {
        input: opts.input,
        column: opts.column,
        cache: opts.cache,
        aliases: opts.aliases,
        review: opts.review,
        refresh: opts.refresh,
        countBy: opts.countBy,
        format: opts.format,
        out: opts.out ?? (opts.format ? `./citegeo-points${EXPORT_EXTENSIONS[opts.format]}` : undefined),
        unresolvedOut: opts.unresolved,
        db: opts.db,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        geocoder: {
            provider: opts.provider,
            baseUrl: opts.geocoderUrl,
            email: opts.email,
        },
    };
}

async function loadConfig(opts: MapOptions) {
    const config = await resolveConfig(toCliConfig(opts), { searchFrom: opts.config });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function fail(message: string, error: unknown): never {
    getLogger().error({ err: error }, message);
    process.exit(1);
}

// ─── MAP command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('map')
        .description('Resolve affiliations from an input file and write aggregated map points')
        .option('-i, --input <path>', 'Input file: .csv or one affiliation per line')
        .option('-c, --column <column>', 'CSV column with affiliations (header name or 1-based index)')
        .option('-r, --review <path>', 'Edited review sheet whose rows override automatic resolution')
        .addOption(new Option('--refresh <mode>', 'Re-resolve cached entries').choices(['none', 'unresolved', 'all']))
        .addOption(new Option('--count-by <mode>', 'Count citing records or distinct affiliations').choices(['occurrences', 'distinct']))
        .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'csv', 'geojson']))
        .option('-o, --out <path>', 'Output file for points')
        .option('-u, --unresolved <path>', 'Output file for unresolved affiliations')
        .option('-d, --db <path>', 'Record the run in this SQLite database')
).action(async (opts: MapOptions) => {
    try {
        const config = await loadConfig(opts);
        const logger = getLogger();
        logger.info({ input: config.input, cache: config.cache, provider: config.geocoder.provider }, 'Starting map run');

        const { result, stats, runId } = await buildMap(config);

        console.log(`\nResolved ${stats.uniqueKeys - stats.unresolved}/${stats.uniqueKeys} affiliations into ${result.points.length} locations`);
        console.log(`  Points:     ${config.out}`);
        console.log(`  Unresolved: ${result.unresolved.length} (see ${config.unresolvedOut})`);
        if (runId !== undefined) console.log(`  Run:        #${runId} in ${config.db}`);
        console.log('');
    } catch (error) {
        fail('Map run failed', error);
    }
});

// ─── REVIEW commands ──────────────────────────────────────

const review = program.command('review').description('Export or import a manual-review sheet');

withCommonOptions(
    review
        .command('export')
        .description('Resolve affiliations and write them to a CSV sheet for manual review')
        .requiredOption('-i, --input <path>', 'Input file: .csv or one affiliation per line')
        .option('-c, --column <column>', 'CSV column with affiliations')
        .requiredOption('-o, --out <path>', 'Review sheet path (.csv)')
).action(async (opts: MapOptions) => {
    try {
        const config = await loadConfig({ ...opts, out: undefined });
        const { records } = await resolveInput(config);
        const rows = writeReviewSheet(records, opts.out ?? 'review.csv');
        console.log(`Review sheet written: ${opts.out} (${rows} rows)`);
    } catch (error) {
        fail('Review export failed', error);
    }
});

withCommonOptions(
    review
        .command('import')
        .description('Apply an edited review sheet to the resolution cache')
        .requiredOption('-i, --input <path>', 'Edited review sheet (.csv)')
).action(async (opts: MapOptions) => {
    try {
        const config = await loadConfig({ ...opts, input: undefined });
        const sheet = readReviewSheet(opts.input ?? '');
        const applied = applyOverrides(new ResolutionCache({ path: config.cache }), sheet.records);

        console.log(`Applied ${applied} reviewed entries to ${config.cache}`);
        for (const issue of sheet.issues) {
            console.log(`  Skipped row ${issue.row}: ${issue.message}`);
        }
    } catch (error) {
        fail('Review import failed', error);
    }
});

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the resolution cache')
    .argument('<action>', 'Action: stats | clear')
    .option('--cache <path>', 'Resolution cache JSON file')
    .option('--config <dir>', 'Directory to look for citegeo.config.json in')
    .option('--unresolved', 'With clear: remove only unresolved entries')
    .action(async (action: string, opts: { cache?: string; config?: string; unresolved?: boolean }) => {
        try {
            const config = await resolveConfig({ cache: opts.cache }, { searchFrom: opts.config });
            const cache = new ResolutionCache({ path: config.cache });

            switch (action) {
                case 'stats': {
                    const stats = cache.getStats();
                    console.log(`\nResolution cache: ${stats.path}\n`);
                    console.log(`  Entries:    ${stats.entries}`);
                    console.log(`  Resolved:   ${stats.resolved}`);
                    console.log(`  Unresolved: ${stats.unresolved}`);
                    for (const [source, count] of Object.entries(stats.bySource)) {
                        console.log(`    ${source}: ${count}`);
                    }
                    console.log('');
                    break;
                }
                case 'clear': {
                    const removed = opts.unresolved
                        ? cache.clear((record) => record.status === 'unresolved')
                        : cache.clear();
                    cache.flush();
                    console.log(`Removed ${removed} cache entries.`);
                    break;
                }
                default:
                    console.error(`Unknown action: ${action}. Valid: stats, clear`);
                    process.exit(1);
            }
        } catch (error) {
            fail('Cache command failed', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show run history statistics')
    .requiredOption('-d, --db <path>', 'Run history database path')
    .action((opts: { db: string }) => {
        try {
            const db = new CiteGeoDatabase(opts.db);
            const stats = db.getStats();
            const runs = db.getAllRuns();
            db.close();

            console.log('\nciteGeo Run History\n');
            console.log(`  Runs:        ${stats.runs}`);
            if (stats.latestRunId !== null) {
                console.log(`  Latest run:  #${stats.latestRunId}`);
                console.log(`    Points:     ${stats.points}`);
                console.log(`    Total count: ${stats.totalCount}`);
                console.log(`    Unresolved: ${stats.unresolved}`);
            }
            for (const run of runs) {
                console.log(`  #${run.run_id}  ${run.created_at}  ${run.input}`);
            }
            console.log('');
        } catch (error) {
            fail('Inspect failed', error);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Re-export the points of a stored run')
    .requiredOption('-d, --db <path>', 'Run history database path')
    .addOption(new Option('-f, --format <format>', 'Export format').choices(['json', 'csv', 'geojson']).makeOptionMandatory())
    .option('--run <id>', 'Run ID (defaults to the latest run)')
    .option('-o, --out <path>', 'Output file path')
    .action((opts: { db: string; format: OutputFormat; run?: string; out?: string }) => {
        const outputPath = opts.out ?? opts.db.replace(/\.db$/, '') + EXPORT_EXTENSIONS[opts.format];

        try {
            const runId = exportRun(opts.db, outputPath, opts.format, opts.run ? parseInt(opts.run, 10) : undefined);
            console.log(`Exported run #${runId} to ${outputPath}`);
        } catch (error) {
            console.error('Export failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

await program.parseAsync();
