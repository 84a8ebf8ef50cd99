import fs from "node:fs";
import path from "node:path";
import type { AttendanceRow, ChatFile } from '../types';
import { parseChatText } from '../parsers/record-assembler';
import { orderFilesBySessionDate } from '../parsers/chat-merger';
import { parseAttendanceCsv } from '../parsers/attendance.parser';
import { decodeChatBuffer, resolveChatPaths, resolveInputPaths } from '../utils/file.utils';
import { ATTENDANCE_FILE_EXTENSIONS, DEFAULT_ENCODING } from '../utils/constants';
import { InvalidArgumentError } from '../utils/errors';

// ============================================================================
// FILE PROCESSING
// ============================================================================

export type LoadOptions = {
    encoding?: string;
    sortByDate?: boolean;
};

/**
 * Reads, decodes and parses a single transcript file
 */
export function parseChatFile(filePath: string, encoding: string = DEFAULT_ENCODING): ChatFile {
    const fileName = path.basename(filePath);
    const text = decodeChatBuffer(fs.readFileSync(filePath), fileName, encoding);
    return { fileName, records: parseChatText(text, fileName) };
}

/**
 * Loads every transcript named by the given file and directory paths, in order.
 * At least one transcript is required.
 */
export function loadChatFiles(inputPaths: readonly string[], options: LoadOptions = {}): ChatFile[] {
    const filePaths = resolveChatPaths(inputPaths);
    if (filePaths.length === 0) {
        throw new InvalidArgumentError("No chat files (.txt) found in the given paths");
    }

    const files = filePaths.map(filePath => parseChatFile(filePath, options.encoding));
    return options.sortByDate ? orderFilesBySessionDate(files) : files;
}

/**
 * Reads every meeting participants export (.csv) named by the given paths
 */
export function loadAttendanceFiles(inputPaths: readonly string[], encoding: string = DEFAULT_ENCODING): AttendanceRow[] {
    const filePaths = resolveInputPaths(inputPaths, ATTENDANCE_FILE_EXTENSIONS);
    if (filePaths.length === 0) {
        throw new InvalidArgumentError("No attendance files (.csv) found in the given paths");
    }

    return filePaths.flatMap(filePath => {
        const fileName = path.basename(filePath);
        return parseAttendanceCsv(decodeChatBuffer(fs.readFileSync(filePath), fileName, encoding), fileName);
    });
}
