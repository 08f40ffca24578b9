import type { AffiliationKey } from '../types/index.js';

/**
 * Abbreviations expanded before punctuation is stripped.
 * Patterns run against lowercased, diacritic-free text.
 */
const ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
    [/\buniv\b\.?/g, 'university'],
    [/\binst\b\.?/g, 'institute'],
    [/\bdept\b\.?/g, 'department'],
    [/\btech\./g, 'technology'],
    [/\bnatl\b\.?/g, 'national'],
    [/\blab\./g, 'laboratory'],
    [/\bctr\b\.?/g, 'center'],
    [/\bcoll\b\.?/g, 'college'],
    [/&/g, ' and '],
];

/**
 * Canonicalize a raw affiliation or city string into a lookup key.
 *
 * - Unicode NFKD, combining marks removed ("Zürich" → "zurich")
 * - Lowercase
 * - Known abbreviations expanded ("Univ." → "university")
 * - Periods and apostrophes dropped ("U.S.A." → "usa"); other punctuation except commas becomes a space
 * - Whitespace collapsed, comma spacing normalized, empty fields dropped
 *
 * Total: any input, including empty or punctuation-only strings, yields a key (possibly "").
 */
export function normalize(raw: string): AffiliationKey {
    let text = raw
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase();

    for (const [pattern, replacement] of ABBREVIATIONS) {
        text = text.replace(pattern, replacement);
    }

    return text
        .replace(/[.'’]/g, '')
        .replace(/[^\p{L}\p{N}\s,]/gu, ' ')
        .split(',')
        .map((field) => field.replace(/\s+/g, ' ').trim())
        .filter((field) => field.length > 0)
        .join(', ');
}
