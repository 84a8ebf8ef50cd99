import type { ChatFile, ChatRecord } from '../types';
import { compareCodeUnits, extractSessionDate } from '../utils/text.utils';

// ============================================================================
// CHAT MERGING UTILITIES
// ============================================================================

/**
 * Concatenates the records of several transcripts in the order the files were supplied.
 * Speakers are not deduplicated across files; the same name in two files is the same person.
 */
export function mergeChatFiles(files: readonly ChatFile[]): ChatRecord[] {
    return files.flatMap(file => file.records);
}

/**
 * Orders files by the GMT<YYYYMMDD> token in their names. The sort is stable,
 * and files without a date keep their relative order after the dated ones.
 */
export function orderFilesBySessionDate<T extends { fileName: string }>(files: readonly T[]): T[] {
    return files
        .map((file, index) => ({ file, index, date: extractSessionDate(file.fileName) }))
        .sort((a, b) => {
            if (a.date && b.date) {
                return compareCodeUnits(a.date, b.date) || a.index - b.index;
            }
            if (a.date) return -1;
            if (b.date) return 1;
            return a.index - b.index;
        })
        .map(entry => entry.file);
}
