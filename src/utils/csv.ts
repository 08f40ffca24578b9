/**
 * Minimal RFC 4180 CSV helpers for the review sheet and affiliation inputs.
 */

/**
 * Quote a field when it contains a delimiter, quote, or line break.
 */
export function escapeCsvField(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: Array<string | number | null | undefined>): string {
    return values.map(escapeCsvField).join(',');
}

/**
 * Parse CSV text into rows of fields. Quoted fields may contain commas,
 * doubled quotes and line breaks. A trailing newline does not add an empty row.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

    for (let i = 0; i < input.length; i++) {
        const char = input.charAt(i);

        if (inQuotes) {
            if (char === '"') {
                if (input.charAt(i + 1) === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += char;
            }
            continue;
        }

        switch (char) {
            case '"':
                inQuotes = true;
                break;
            case ',':
                row.push(field);
                field = '';
                break;
            case '\r':
                break;
            case '\n':
                row.push(field);
                rows.push(row);
                row = [];
                field = '';
                break;
            default:
                field += char;
        }
    }

    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}
