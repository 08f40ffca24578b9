import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { ResolutionRecord } from '../types/index.js';
import { normalize } from '../resolve/normalizer.js';
import { ConfigError } from '../utils/errors.js';
import { formatCsvRow, parseCsv } from '../utils/csv.js';
import { getComponentLogger } from '../utils/logger.js';

export const REVIEW_COLUMNS = ['raw', 'key', 'status', 'canonical_location', 'latitude', 'longitude', 'source'] as const;

const coordinate = (min: number, max: number) =>
    z
        .string()
        .trim()
        .refine((v) => v === '' || (Number.isFinite(Number(v)) && Number(v) >= min && Number(v) <= max), {
            message: `must be empty or a number between ${min} and ${max}`,
        })
        .transform((v) => (v === '' ? undefined : Number(v)));

const reviewRowSchema = z.object({
    raw: z.string().trim().min(1, 'raw affiliation is empty'),
    status: z.enum(['resolved', 'unresolved', '']).catch(''),
    canonical_location: z.string().trim(),
    latitude: coordinate(-90, 90),
    longitude: coordinate(-180, 180),
});

export interface ReviewSheetIssue {
    /** 1-based row number in the sheet, header included */
    row: number;
    message: string;
}

export interface ReviewSheet {
    records: ResolutionRecord[];
    issues: ReviewSheetIssue[];
}

/**
 * Write resolution records as a CSV sheet for manual review, one row per raw string.
 * Reviewers fix `canonical_location`/`latitude`/`longitude` (or clear them) and feed the
 * sheet back through `readReviewSheet()`.
 */
export function writeReviewSheet(records: ReadonlyMap<string, ResolutionRecord>, path: string): number {
    const lines = [REVIEW_COLUMNS.join(',')];
    const raws = [...records.keys()].sort();

    for (const raw of raws) {
        const record = records.get(raw);
        if (!record) continue;
        lines.push(formatCsvRow([
            raw,
            record.key,
            record.status,
            record.canonicalLocation,
            record.latitude,
            record.longitude,
            record.source,
        ]));
    }

    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, lines.join('\n') + '\n', 'utf-8');
    getComponentLogger('review').info({ path, rows: raws.length }, 'Review sheet written');
    return raws.length;
}

/**
 * Read an edited review sheet back into resolution records keyed by `normalize(raw)`.
 *
 * A row is resolved when it has a canonical location and both coordinates, and its status
 * is not explicitly `unresolved`; otherwise it is unresolved. Invalid rows are skipped and
 * reported in `issues`. When several rows share a key, the last one wins.
 *
 * @throws ConfigError if the file cannot be read or lacks required columns
 */
export function readReviewSheet(path: string): ReviewSheet {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read review sheet ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const [header, ...rows] = parseCsv(text);
    const names = (header ?? []).map((name) => name.trim().toLowerCase());
    const required = ['raw', 'canonical_location', 'latitude', 'longitude'];
    const missing = required.filter((name) => !names.includes(name));
    if (missing.length > 0) {
        throw new ConfigError(`Review sheet ${path} is missing columns: ${missing.join(', ')}`);
    }

    const byKey = new Map<string, ResolutionRecord>();
    const issues: ReviewSheetIssue[] = [];

    rows.forEach((cells, index) => {
        const rowNumber = index + 2;
        if (cells.every((cell) => cell.trim() === '')) return;

        const values = Object.fromEntries(names.map((name, i) => [name, cells[i] ?? '']));
        const parsed = reviewRowSchema.safeParse(values);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            issues.push({
                row: rowNumber,
                message: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row',
            });
            return;
        }

        const row = parsed.data;
        const key = normalize(row.raw);
        const canonicalLocation = row.canonical_location || undefined;
        const resolvable = canonicalLocation !== undefined && row.latitude !== undefined && row.longitude !== undefined;

        const record: ResolutionRecord = resolvable && row.status !== 'unresolved'
            ? {
                key,
                status: 'resolved',
                canonicalLocation,
                latitude: row.latitude,
                longitude: row.longitude,
                source: 'cache',
            }
            : { key, status: 'unresolved', source: 'cache' };
        if (record.status === 'unresolved' && canonicalLocation !== undefined) {
            record.canonicalLocation = canonicalLocation;
        }

        byKey.set(key, record);
    });

    if (issues.length > 0) {
        getComponentLogger('review').warn({ path, issues }, 'Skipped invalid review rows');
    }

    return { records: [...byKey.values()], issues };
}
