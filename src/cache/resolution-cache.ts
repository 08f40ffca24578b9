import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { AffiliationKey, ResolutionRecord } from '../types/index.js';
import { CachePersistenceError } from '../utils/errors.js';
import { getComponentLogger } from '../utils/logger.js';
import { normalize } from '../resolve/normalizer.js';

const CACHE_FORMAT_VERSION = 1;

const cachedRecordSchema = z
    .object({
        status: z.enum(['resolved', 'unresolved']),
        canonicalLocation: z.string().min(1).optional(),
        latitude: z.number().min(-90).max(90).optional(),
        longitude: z.number().min(-180).max(180).optional(),
        source: z.enum(['alias', 'cache', 'geocoder']),
    })
    .refine(
        (r) => r.status === 'unresolved' || (r.canonicalLocation !== undefined && r.latitude !== undefined && r.longitude !== undefined),
        { message: 'resolved entries need canonicalLocation, latitude and longitude' }
    );

const cacheFileSchema = z.object({
    version: z.literal(CACHE_FORMAT_VERSION),
    entries: z.record(cachedRecordSchema),
});

type CachedRecord = z.infer<typeof cachedRecordSchema>;

/**
 * Persistent key → resolution store, kept as a pretty-printed JSON document so a
 * reviewer can fix a bad entry by hand before the next run.
 *
 * ```json
 * {
 *   "version": 1,
 *   "entries": {
 *     "mit, cambridge, usa": { "status": "resolved", "canonicalLocation": "Cambridge, USA", ... }
 *   }
 * }
 * ```
 *
 * Loaded once at construction. With `autoFlush` (the default) every write that changes
 * content is persisted immediately; writes land in a temp file that is renamed over the
 * document, so an interrupted run leaves the previous state intact.
 */
export class ResolutionCache {
    private readonly entries = new Map<AffiliationKey, ResolutionRecord>();
    private readonly path: string;
    private readonly autoFlush: boolean;
    private dirty = false;

    constructor(options: { path: string; autoFlush?: boolean }) {
        this.path = options.path;
        this.autoFlush = options.autoFlush ?? true;
        this.load();
    }

    get(key: AffiliationKey): ResolutionRecord | undefined {
        const record = this.entries.get(key);
        return record ? { ...record } : undefined;
    }

    /**
     * Store a record under `key`. Writing equal content again is a no-op;
     * different content overwrites.
     *
     * @throws CachePersistenceError if auto-flush fails
     */
    put(key: AffiliationKey, record: ResolutionRecord): void {
        const next = toRecord(key, record);
        const existing = this.entries.get(key);
        if (existing && recordsEqual(existing, next)) return;

        this.entries.set(key, next);
        this.dirty = true;
        if (this.autoFlush) this.flush();
    }

    delete(key: AffiliationKey): boolean {
        const removed = this.entries.delete(key);
        if (removed) {
            this.dirty = true;
            if (this.autoFlush) this.flush();
        }
        return removed;
    }

    /**
     * Remove every entry, or only those matching `predicate`.
     * Returns the number of entries removed.
     */
    clear(predicate?: (record: ResolutionRecord) => boolean): number {
        let removed = 0;
        for (const [key, record] of this.entries) {
            if (!predicate || predicate(record)) {
                this.entries.delete(key);
                removed++;
            }
        }

        if (removed > 0) {
            this.dirty = true;
            if (this.autoFlush) this.flush();
        }
        return removed;
    }

    keys(): AffiliationKey[] {
        return [...this.entries.keys()].sort();
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Persist in-memory state. Keys are written sorted so diffs between runs stay small.
     *
     * @throws CachePersistenceError on any I/O failure
     */
    flush(): void {
        if (!this.dirty && existsSync(this.path)) return;

        const document = {
            version: CACHE_FORMAT_VERSION,
            entries: Object.fromEntries(this.keys().flatMap((key) => {
                const record = this.entries.get(key);
                return record ? [[key, toCached(record)]] : [];
            })),
        };

        const tmpPath = `${this.path}.tmp-${process.pid}`;
        try {
            mkdirSync(dirname(this.path), { recursive: true });
            writeFileSync(tmpPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
            renameSync(tmpPath, this.path);
        } catch (error) {
            throw new CachePersistenceError(
                `Failed to write resolution cache ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
                this.path,
                { cause: error }
            );
        }

        this.dirty = false;
        getComponentLogger('cache').debug({ path: this.path, entries: this.entries.size }, 'Cache flushed');
    }

    getStats(): { path: string; entries: number; resolved: number; unresolved: number; bySource: Record<string, number> } {
        let resolved = 0;
        const bySource: Record<string, number> = {};
        for (const record of this.entries.values()) {
            if (record.status === 'resolved') resolved++;
            bySource[record.source] = (bySource[record.source] ?? 0) + 1;
        }
        return {
            path: this.path,
            entries: this.entries.size,
            resolved,
            unresolved: this.entries.size - resolved,
            bySource,
        };
    }

    private load(): void {
        if (!existsSync(this.path)) {
            getComponentLogger('cache').debug({ path: this.path }, 'No cache file yet, starting empty');
            return;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.path, 'utf-8'));
        } catch (error) {
            throw new CachePersistenceError(
                `Failed to read resolution cache ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
                this.path,
                { cause: error }
            );
        }

        const parsed = cacheFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new CachePersistenceError(
                `Invalid resolution cache ${this.path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
                this.path
            );
        }

        const logger = getComponentLogger('cache');
        const handEdited: Array<[AffiliationKey, CachedRecord]> = [];
        for (const [key, cached] of Object.entries(parsed.data.entries)) {
            if (normalize(key) === key) {
                this.entries.set(key, toRecord(key, cached));
            } else {
                handEdited.push([key, cached]);
            }
        }

        // Keys typed by hand ("MIT") are stored under their normalized form; an entry
        // already under that key is kept
        for (const [rawKey, cached] of handEdited) {
            const key = normalize(rawKey);
            if (!key || this.entries.has(key)) {
                logger.warn({ path: this.path, key: rawKey, normalized: key }, 'Ignoring cache entry whose normalized key is empty or taken');
                continue;
            }
            logger.info({ key: rawKey, normalized: key }, 'Normalized hand-edited cache key');
            this.entries.set(key, toRecord(key, cached));
            this.dirty = true;
        }

        logger.debug({ path: this.path, entries: this.entries.size }, 'Cache loaded');
    }
}

/**
 * Copy only the fields a record owns, dropping coordinates from unresolved entries
 * that a hand edit may have left behind.
 */
function toRecord(key: AffiliationKey, source: CachedRecord | ResolutionRecord): ResolutionRecord {
    const record: ResolutionRecord = { key, status: source.status, source: source.source };
    if (source.canonicalLocation !== undefined) record.canonicalLocation = source.canonicalLocation;
    if (source.status === 'resolved') {
        if (source.latitude !== undefined) record.latitude = source.latitude;
        if (source.longitude !== undefined) record.longitude = source.longitude;
    }
    return record;
}

function toCached(record: ResolutionRecord): CachedRecord {
    const { key: _key, ...rest } = record;
    return rest;
}

export function recordsEqual(a: ResolutionRecord, b: ResolutionRecord): boolean {
    return (
        a.key === b.key &&
        a.status === b.status &&
        a.canonicalLocation === b.canonicalLocation &&
        a.latitude === b.latitude &&
        a.longitude === b.longitude &&
        a.source === b.source
    );
}
