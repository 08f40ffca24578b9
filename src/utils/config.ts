import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CiteGeoConfig, type GeocoderConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getComponentLogger } from './logger.js';

const retryPolicySchema = z.object({
    maxAttempts: z.number().int().min(1).max(10),
    baseDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    jitter: z.number().min(0).max(1),
});

/**
 * Shape accepted in citegeo.config.json. Everything is optional; defaults fill the rest.
 */
const fileConfigSchema = z
    .object({
        input: z.string(),
        column: z.union([z.string(), z.number().int().min(1).transform(String)]),
        cache: z.string(),
        aliases: z.string(),
        review: z.string(),
        refresh: z.enum(['none', 'unresolved', 'all']),
        countBy: z.enum(['occurrences', 'distinct']),
        out: z.string(),
        format: z.enum(['json', 'csv', 'geojson']),
        unresolvedOut: z.string(),
        db: z.string(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        geocoder: z
            .object({
                provider: z.enum(['nominatim', 'locationiq']),
                baseUrl: z.string().url(),
                email: z.string().email(),
                apiKey: z.string().min(1),
                timeoutMs: z.number().int().positive(),
                retry: retryPolicySchema.partial(),
            })
            .partial(),
    })
    .partial()
    .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * CLI flags. Geocoder settings are flattened, unlike the file shape.
 */
export type CliConfig = Partial<Omit<CiteGeoConfig, 'geocoder'>> & { geocoder?: Partial<Omit<GeocoderConfig, 'retry'>> };

/**
 * Load configuration from citegeo.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 *
 * @throws ConfigError if the file exists but is invalid
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('citegeo', {
        searchPlaces: ['citegeo.config.json', 'package.json'],
    });

    const result = await explorer.search(searchFrom).catch((error: unknown) => {
        throw new ConfigError(`Failed to load config file: ${error instanceof Error ? error.message : String(error)}`);
    });

    if (!result || result.isEmpty) return null;

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(
            `Invalid config file ${result.filepath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`
        );
    }

    getComponentLogger('config').debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): { email?: string; apiKey?: string } {
    const vars: { email?: string; apiKey?: string } = {};
    if (env['CITEGEO_GEOCODER_EMAIL']) vars.email = env['CITEGEO_GEOCODER_EMAIL'];
    if (env['LOCATIONIQ_API_KEY']) vars.apiKey = env['LOCATIONIQ_API_KEY'];
    return vars;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: CliConfig,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<CiteGeoConfig> {
    const file: FileConfig = (await loadConfigFile(options.searchFrom)) ?? {};
    const env = loadEnvVars(options.env ?? process.env);
    const cli = cliFlags.geocoder ?? {};
    const defaults = DEFAULT_CONFIG.geocoder;

    return {
        input: cliFlags.input ?? file.input,
        column: cliFlags.column ?? file.column,
        cache: cliFlags.cache ?? file.cache ?? DEFAULT_CONFIG.cache,
        aliases: cliFlags.aliases ?? file.aliases,
        review: cliFlags.review ?? file.review,
        refresh: cliFlags.refresh ?? file.refresh ?? DEFAULT_CONFIG.refresh,
        countBy: cliFlags.countBy ?? file.countBy ?? DEFAULT_CONFIG.countBy,
        out: cliFlags.out ?? file.out ?? DEFAULT_CONFIG.out,
        format: cliFlags.format ?? file.format ?? DEFAULT_CONFIG.format,
        unresolvedOut: cliFlags.unresolvedOut ?? file.unresolvedOut ?? DEFAULT_CONFIG.unresolvedOut,
        db: cliFlags.db ?? file.db,
        logLevel: cliFlags.logLevel ?? file.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? file.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
        geocoder: {
            provider: cli.provider ?? file.geocoder?.provider ?? defaults.provider,
            baseUrl: cli.baseUrl ?? file.geocoder?.baseUrl,
            email: cli.email ?? env.email ?? file.geocoder?.email,
            apiKey: cli.apiKey ?? env.apiKey ?? file.geocoder?.apiKey,
            timeoutMs: cli.timeoutMs ?? file.geocoder?.timeoutMs ?? defaults.timeoutMs,
            retry: { ...defaults.retry, ...file.geocoder?.retry },
        },
    };
}
