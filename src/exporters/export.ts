import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { CiteGeoDatabase } from '../storage/database.js';
import type { AggregationResult, OutputFormat } from '../types/index.js';
import { formatCsvRow } from '../utils/csv.js';
import { getComponentLogger } from '../utils/logger.js';

export const EXPORT_EXTENSIONS: Record<OutputFormat, string> = {
    json: '.json',
    csv: '.csv',
    geojson: '.geojson',
};

// ─── Main Export Functions ───────────────────────────────

/**
 * Write aggregated points for downstream rendering.
 */
export function exportPoints(result: AggregationResult, outputPath: string, format: OutputFormat): void {
    let content: string;
    switch (format) {
        case 'json':
            content = exportJson(result);
            break;
        case 'csv':
            content = exportCSV(result);
            break;
        case 'geojson':
            content = exportGeoJSON(result);
            break;
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }

    writeOutput(outputPath, content);
    getComponentLogger('export').info({ format, outputPath, points: result.points.length }, 'Points exported');
}

/**
 * Write unresolved raw strings, one per line, for manual review.
 * An empty list writes an empty file so stale reports do not linger.
 */
export function exportUnresolved(unresolved: readonly string[], outputPath: string): void {
    const lines = [...new Set(unresolved)].sort();
    writeOutput(outputPath, lines.length > 0 ? lines.join('\n') + '\n' : '');
    getComponentLogger('export').info({ outputPath, unresolved: lines.length }, 'Unresolved list written');
}

/**
 * Re-export a stored run (the latest when `runId` is omitted).
 */
export function exportRun(dbPath: string, outputPath: string, format: OutputFormat, runId?: number): number {
    const db = new CiteGeoDatabase(dbPath);

    try {
        const id = runId ?? db.getLatestRunId();
        if (id === undefined || !db.getRun(id)) {
            throw new Error(runId === undefined ? `No runs stored in ${dbPath}` : `Run ${runId} not found in ${dbPath}`);
        }

        exportPoints(db.getResult(id), outputPath, format);
        return id;
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(result: AggregationResult): string {
    return JSON.stringify({
        citegeo: {
            version: '1.0.0',
            exported_at: new Date().toISOString(),
        },
        points: result.points,
        unresolved: result.unresolved,
    }, null, 2);
}

function exportCSV(result: AggregationResult): string {
    let csv = 'canonical_location,latitude,longitude,count\n';
    for (const point of result.points) {
        csv += formatCsvRow([point.canonicalLocation, point.latitude, point.longitude, point.count]) + '\n';
    }
    return csv;
}

function exportGeoJSON(result: AggregationResult): string {
    return JSON.stringify({
        type: 'FeatureCollection',
        features: result.points.map((point) => ({
            type: 'Feature',
            // GeoJSON positions are [longitude, latitude]
            geometry: { type: 'Point', coordinates: [point.longitude, point.latitude] },
            properties: { name: point.canonicalLocation, count: point.count },
        })),
    }, null, 2);
}

function writeOutput(outputPath: string, content: string): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, 'utf-8');
}
