import type { ChatRecord, RawLine } from '../types';
import { CONTINUATION_SEPARATOR } from '../utils/constants';
import { classifyLine } from './line-classifier';

// ============================================================================
// RECORD ASSEMBLY
// ============================================================================

type AssemblyState = {
    records: ChatRecord[];
    current: ChatRecord | null;
};

/**
 * Splits transcript text into numbered lines tagged with their source file
 */
export function toRawLines(text: string, sourceFile: string): RawLine[] {
    return text.split(/\r?\n/).map((line, index) => ({
        text: line,
        sourceFile,
        lineNumber: index + 1
    }));
}

function step(state: AssemblyState, line: RawLine): AssemblyState {
    const classified = classifyLine(line.text);

    if (classified.kind === 'message') {
        if (state.current) {
            state.records.push(state.current);
        }
        const current: ChatRecord = {
            timestamp: classified.timestamp,
            speaker: classified.speaker,
            message: classified.message,
            sourceFile: line.sourceFile
        };
        if (classified.role) {
            current.role = classified.role;
        }
        return { records: state.records, current };
    }

    // Blank lines carry nothing; text before the first header has no speaker and is dropped
    if (!classified.text || !state.current) {
        return state;
    }

    return {
        records: state.records,
        current: {
            ...state.current,
            message: state.current.message + CONTINUATION_SEPARATOR + classified.text
        }
    };
}

/**
 * Folds one file's lines into chat records, merging continuation lines into
 * the message they follow. Output order is input order.
 */
export function assembleRecords(lines: readonly RawLine[]): ChatRecord[] {
    const final = lines.reduce<AssemblyState>(step, { records: [], current: null });
    if (final.current) {
        final.records.push(final.current);
    }
    return final.records;
}

/**
 * Parses a whole transcript into chat records
 */
export function parseChatText(text: string, sourceFile: string): ChatRecord[] {
    return assembleRecords(toRawLines(text, sourceFile));
}
