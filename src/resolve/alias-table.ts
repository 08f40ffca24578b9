import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AffiliationKey } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { normalize } from './normalizer.js';

/**
 * Bundled institution-to-city mappings.
 */
export const DEFAULT_ALIASES_PATH = fileURLToPath(new URL('../../data/aliases.json', import.meta.url));

/**
 * Canonical location an institution variant maps to.
 * Entries without coordinates are geocoded by canonical name on first use.
 */
export interface AliasEntry {
    canonicalLocation: string;
    latitude?: number;
    longitude?: number;
}

export interface AliasDefinition extends AliasEntry {
    variants: string[];
}

const aliasFileSchema = z.object({
    version: z.literal(1),
    aliases: z.array(
        z.object({
            canonicalLocation: z.string().trim().min(1),
            latitude: z.number().min(-90).max(90).optional(),
            longitude: z.number().min(-180).max(180).optional(),
            variants: z.array(z.string()).min(1),
        })
    ),
});

/**
 * Immutable variant → canonical location table.
 * Built once and handed to the pipeline; lookups are exact matches on normalized keys.
 */
export class AliasTable {
    private readonly entries: ReadonlyMap<AffiliationKey, Readonly<AliasEntry>>;

    private constructor(entries: Map<AffiliationKey, AliasEntry>) {
        this.entries = entries;
    }

    static empty(): AliasTable {
        return new AliasTable(new Map());
    }

    /**
     * Build a table from alias definitions. Variants are normalized here, so callers
     * may list them in any casing or punctuation.
     *
     * @throws ConfigError when one variant maps to two different locations
     */
    static fromDefinitions(definitions: readonly AliasDefinition[]): AliasTable {
        const entries = new Map<AffiliationKey, AliasEntry>();

        for (const definition of definitions) {
            const entry: AliasEntry = { canonicalLocation: definition.canonicalLocation };
            if (definition.latitude !== undefined && definition.longitude !== undefined) {
                entry.latitude = definition.latitude;
                entry.longitude = definition.longitude;
            }

            for (const variant of definition.variants) {
                const key = normalize(variant);
                if (!key) continue;

                const existing = entries.get(key);
                if (existing && existing.canonicalLocation !== entry.canonicalLocation) {
                    throw new ConfigError(
                        `Alias "${variant}" maps to both "${existing.canonicalLocation}" and "${entry.canonicalLocation}"`
                    );
                }
                entries.set(key, Object.freeze({ ...entry }));
            }
        }

        return new AliasTable(entries);
    }

    /**
     * Convenience form: `{ "MIT": "Cambridge, USA" }`.
     */
    static fromRecord(record: Record<string, string>): AliasTable {
        return AliasTable.fromDefinitions(
            Object.entries(record).map(([variant, canonicalLocation]) => ({ canonicalLocation, variants: [variant] }))
        );
    }

    lookup(key: AffiliationKey): Readonly<AliasEntry> | undefined {
        return this.entries.get(key);
    }

    get size(): number {
        return this.entries.size;
    }
}

/**
 * Load an alias table from a JSON file (defaults to the bundled table).
 *
 * @throws ConfigError if the file is missing or malformed
 */
export function loadAliasTable(path: string = DEFAULT_ALIASES_PATH): AliasTable {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Cannot read alias table ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = aliasFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(`Invalid alias table ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`);
    }

    return AliasTable.fromDefinitions(parsed.data.aliases);
}
