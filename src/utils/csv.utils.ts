/**
 * CSV Export Utilities
 */

import type { ChatRecord } from '../types';
import { CSV_COLUMNS } from './constants';
import { UnreadableInputError } from './errors';

// ============================================================================
// WRITING
// ============================================================================

const NEEDS_QUOTES_REGEX = /[",\r\n]|^\s|\s$/;

export function escapeCsvCell(value: string): string {
    if (!NEEDS_QUOTES_REGEX.test(value)) {
        return value;
    }
    return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Serialises records to CSV, one row per record, with a header row.
 * An absent role is written as an empty cell.
 */
export function recordsToCsv(records: readonly ChatRecord[]): string {
    const rows = records.map(record => [
        record.timestamp,
        record.role ?? '',
        record.speaker,
        record.message,
        record.sourceFile
    ]);

    return [Array.from(CSV_COLUMNS), ...rows]
        .map(row => row.map(escapeCsvCell).join(','))
        .join('\n') + '\n';
}

// ============================================================================
// READING
// ============================================================================

/**
 * Splits CSV content into rows of cells. Handles quoted fields, escaped
 * quotes and line breaks inside quotes. Cell values are not trimmed.
 */
export function parseCsvRows(content: string): string[][] {
    const rows: string[][] = [];
    let currentRow: string[] = [];
    let currentCell = '';
    let inQuotes = false;

    for (let i = 0; i < content.length; i++) {
        const char = content[i];
        const nextChar = content[i + 1];

        if (inQuotes) {
            if (char === '"') {
                if (nextChar === '"') {
                    // Escaped quote
                    currentCell += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                currentCell += char;
            }
            continue;
        }

        if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            currentRow.push(currentCell);
            currentCell = '';
        } else if (char === '\n' || char === '\r') {
            if (char === '\r' && nextChar === '\n') {
                i++;
            }
            currentRow.push(currentCell);
            rows.push(currentRow);
            currentRow = [];
            currentCell = '';
        } else {
            currentCell += char;
        }
    }

    // Last row without a trailing newline
    if (currentRow.length > 0 || currentCell.length > 0) {
        currentRow.push(currentCell);
        rows.push(currentRow);
    }

    return rows;
}

/**
 * Reads a CSV export written by recordsToCsv back into records
 */
export function csvToRecords(content: string): ChatRecord[] {
    const rows = parseCsvRows(content);
    const [header, ...body] = rows;

    if (!header || header.join(',') !== CSV_COLUMNS.join(',')) {
        throw new UnreadableInputError(`CSV header must be "${CSV_COLUMNS.join(',')}"`);
    }

    return body
        .filter(row => !(row.length === 1 && row[0] === ''))
        .map((row, index) => {
            if (row.length !== CSV_COLUMNS.length) {
                throw new UnreadableInputError(
                    `CSV row ${index + 2} has ${row.length} cells, expected ${CSV_COLUMNS.length}`
                );
            }

            const [timestamp, role, speaker, message, sourceFile] = row;
            const record: ChatRecord = { timestamp, speaker, message, sourceFile };
            if (role) {
                record.role = role;
            }
            return record;
        });
}
