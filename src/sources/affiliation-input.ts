import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { ConfigError } from '../utils/errors.js';
import { parseCsv } from '../utils/csv.js';
import { getComponentLogger } from '../utils/logger.js';

/**
 * Raw affiliation strings collected from an input file, with how many citing
 * records each one appeared in.
 */
export interface AffiliationInput {
    occurrences: Map<string, number>;
    /** Number of non-empty cells or lines read */
    records: number;
}

export interface ReadAffiliationsOptions {
    /**
     * CSV column holding affiliations: a header name (case-insensitive) or a 1-based
     * index. Defaults to a header named "affiliation", else the first column.
     */
    column?: string;
}

/**
 * Split a cell holding several affiliations ("MIT; Stanford University") into trimmed values.
 */
export function splitAffiliations(cell: string): string[] {
    return cell
        .split(/[;\n]/)
        .map((value) => value.trim())
        .filter((value) => value.length > 0);
}

/**
 * Read affiliations from a `.csv` file (one column) or any other text file
 * (one affiliation per line). Multi-valued cells are split on `;` and newlines.
 */
export function readAffiliations(path: string, options: ReadAffiliationsOptions = {}): AffiliationInput {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read input ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const cells = extname(path).toLowerCase() === '.csv'
        ? csvColumn(parseCsv(text), options.column, path)
        : text.split(/\r?\n/);

    const occurrences = new Map<string, number>();
    let records = 0;
    for (const cell of cells) {
        const values = splitAffiliations(cell);
        if (values.length === 0) continue;
        records++;
        for (const value of values) {
            occurrences.set(value, (occurrences.get(value) ?? 0) + 1);
        }
    }

    getComponentLogger('input').info({ path, records, distinct: occurrences.size }, 'Affiliations loaded');
    return { occurrences, records };
}

function csvColumn(rows: string[][], column: string | undefined, path: string): string[] {
    const [header, ...body] = rows;
    if (!header) return [];

    const index = resolveColumnIndex(header, column);
    if (index < 0 || index >= header.length) {
        throw new ConfigError(`Column "${column ?? 'affiliation'}" not found in ${path}`);
    }

    return body.map((row) => row[index] ?? '');
}

function resolveColumnIndex(header: string[], column: string | undefined): number {
    const names = header.map((name) => name.trim().toLowerCase());

    if (column === undefined) {
        const byName = names.indexOf('affiliation');
        return byName >= 0 ? byName : 0;
    }

    if (/^\d+$/.test(column)) {
        return parseInt(column, 10) - 1;
    }

    return names.indexOf(column.trim().toLowerCase());
}
