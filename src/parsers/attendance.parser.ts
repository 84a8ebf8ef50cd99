import type { AttendanceRow } from '../types';
import { ATTENDANCE_COLUMNS, ATTENDANCE_TIME_REGEX } from '../utils/constants';
import { parseCsvRows } from '../utils/csv.utils';
import { UnreadableInputError } from '../utils/errors';
import { normaliseParticipantName } from '../utils/text.utils';

// ============================================================================
// MEETING ATTENDANCE EXPORTS
// ============================================================================

type ColumnKey = keyof typeof ATTENDANCE_COLUMNS;
type ColumnIndexes = Record<ColumnKey, number>;

/**
 * Reads "MM/DD/YYYY hh:mm:ss AM" as wall-clock time and returns it as UTC
 * milliseconds. Returns null for anything else, including impossible dates.
 */
export function parseAttendanceTime(value: string): number | null {
    const match = ATTENDANCE_TIME_REGEX.exec(value.trim());
    if (!match) {
        return null;
    }

    const [, month, day, year, hour, minute, second, meridiem] = match;
    const hour12 = Number(hour);
    if (hour12 < 1 || hour12 > 12 || Number(minute) > 59 || Number(second) > 59) {
        return null;
    }

    const hour24 = (hour12 % 12) + (meridiem.toUpperCase() === 'PM' ? 12 : 0);
    const time = Date.UTC(Number(year), Number(month) - 1, Number(day), hour24, Number(minute), Number(second));

    // Date.UTC rolls 02/30 over into March
    const date = new Date(time);
    if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
        return null;
    }
    return time;
}

function findColumns(header: string[]): ColumnIndexes | null {
    const cells = header.map(cell => cell.trim().toLowerCase());
    const indexOf = (title: string) => cells.indexOf(title.toLowerCase());

    const indexes: ColumnIndexes = {
        name: indexOf(ATTENDANCE_COLUMNS.name),
        email: indexOf(ATTENDANCE_COLUMNS.email),
        joinTime: indexOf(ATTENDANCE_COLUMNS.joinTime),
        leaveTime: indexOf(ATTENDANCE_COLUMNS.leaveTime),
        duration: indexOf(ATTENDANCE_COLUMNS.duration)
    };
    return Object.values(indexes).every(index => index !== -1) ? indexes : null;
}

/**
 * Parses one participants export. Summary rows some exports put above the
 * participant table are skipped up to the row holding the column headers.
 */
export function parseAttendanceCsv(content: string, sourceFile: string): AttendanceRow[] {
    const rows = parseCsvRows(content);

    let headerIndex = -1;
    let columns: ColumnIndexes | null = null;
    for (let i = 0; i < rows.length && !columns; i++) {
        columns = findColumns(rows[i]);
        headerIndex = i;
    }

    if (!columns) {
        const expected = Object.values(ATTENDANCE_COLUMNS).join('", "');
        throw new UnreadableInputError(`${sourceFile} has no attendance header ("${expected}")`, sourceFile);
    }
    const indexes = columns;

    const parsed: AttendanceRow[] = [];
    rows.slice(headerIndex + 1).forEach((row, offset) => {
        if (row.every(cell => cell.trim() === '')) {
            return;
        }

        const rowNumber = headerIndex + offset + 2;
        const cell = (key: ColumnKey) => (row[indexes[key]] ?? '').trim();

        const joinedAt = parseAttendanceTime(cell('joinTime'));
        const leftAt = parseAttendanceTime(cell('leaveTime'));
        if (joinedAt === null || leftAt === null) {
            throw new UnreadableInputError(
                `${sourceFile} row ${rowNumber}: join and leave times must look like "02/05/2024 09:01:23 AM"`,
                sourceFile
            );
        }

        const duration = cell('duration');
        const durationMinutes = Number(duration);
        if (duration === '' || !Number.isFinite(durationMinutes)) {
            throw new UnreadableInputError(
                `${sourceFile} row ${rowNumber}: duration "${duration}" is not a number`,
                sourceFile
            );
        }

        parsed.push({
            name: normaliseParticipantName(cell('name')),
            email: cell('email'),
            joinTime: cell('joinTime'),
            leaveTime: cell('leaveTime'),
            joinedAt,
            durationMinutes,
            sourceFile
        });
    });

    return parsed;
}
