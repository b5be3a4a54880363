/**
 * Roster CSV parser
 *
 * Expected header (exact, case-sensitive): name,number,size
 * Extra columns are ignored and missing ones read as blank. Blank sizes
 * default to M; sizes are matched case-insensitively.
 */

import { parse } from 'csv-parse/sync';
import { TeamRosterEntrySchema } from '@jersey-studio/shared';
import type { TeamRosterEntry } from '@jersey-studio/shared';
import { EncodingError, ValidationError, toIssueDetails } from '../../utils/errors.js';

export const DEFAULT_ROSTER_SIZE = 'M';

type CsvRecord = Record<string, string | undefined>;

/**
 * Decode strictly: a single invalid byte rejects the whole file.
 * A leading UTF-8 BOM is dropped.
 */
export function decodeUtf8(content: Uint8Array): string {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    try {
        return decoder.decode(content);
    } catch {
        throw new EncodingError('Invalid CSV: file is not valid UTF-8 text');
    }
}

function readField(record: CsvRecord, column: string): string {
    return (record[column] ?? '').trim();
}

function isBlankRecord(record: CsvRecord): boolean {
    return Object.values(record).every(value => (value ?? '').trim() === '');
}

/**
 * Parse roster rows from an uploaded CSV file.
 *
 * @throws EncodingError when the bytes are not UTF-8
 * @throws ValidationError when the CSV is malformed or a row fails validation
 */
export function parseRosterCsv(content: Uint8Array): TeamRosterEntry[] {
    const text = decodeUtf8(content);

    let records: CsvRecord[];
    try {
        records = parse(text, {
            columns: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
    } catch (parseError) {
        const message = parseError instanceof Error ? parseError.message : String(parseError);
        throw new ValidationError(`Invalid CSV: ${message}`);
    }

    const roster: TeamRosterEntry[] = [];
    records.forEach((record, index) => {
        if (isBlankRecord(record)) return;

        const result = TeamRosterEntrySchema.safeParse({
            name: readField(record, 'name'),
            number: readField(record, 'number'),
            size: readField(record, 'size').toUpperCase() || DEFAULT_ROSTER_SIZE,
        });

        if (!result.success) {
            const rowNumber = index + 1;
            const details = toIssueDetails(result.error.issues);
            const reason = details.map(d => `${d.path}: ${d.message}`).join('; ');
            throw new ValidationError(
                `Invalid CSV: row ${rowNumber} ${JSON.stringify(record)}: ${reason}`,
                { row: rowNumber, record, issues: details }
            );
        }

        roster.push(result.data);
    });

    return roster;
}
