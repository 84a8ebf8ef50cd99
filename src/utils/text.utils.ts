/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import { CONTROL_MARKS_REGEX, EMOJI_REGEX, REACTION_REGEX, SESSION_DATE_REGEX } from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Removes control and direction marks that chat clients inject into exports
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Normalises participant display names by collapsing any run of whitespace
 * characters (including non-breaking/narrow no-break spaces) into a single
 * ASCII space and trimming leading/trailing spaces.
 */
export function normaliseParticipantName(name: string): string {
    return stripControlMarks(name)
        .replace(/[\u00A0\u202F\u2007]/g, ' ') // NBSP, NNBSP, figure space
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Counts the number of emojis in text using proper grapheme splitting
 */
export function countEmojis(text: string): number {
    const clusters = GRAPHEME_SPLITTER.splitGraphemes(text);
    let count = 0;

    for (const cluster of clusters) {
        // EMOJI_REGEX is global, so reset its cursor before every test
        EMOJI_REGEX.lastIndex = 0;
        if (EMOJI_REGEX.test(cluster)) {
            count += 1;
        }
    }

    return count;
}

export function isReaction(message: string): boolean {
    return REACTION_REGEX.test(message);
}

/**
 * Extracts the YYYYMMDD token that follows "GMT" in an export file name.
 * The token is display metadata only and is never turned into a Date.
 */
export function extractSessionDate(fileName: string): string | undefined {
    const match = SESSION_DATE_REGEX.exec(fileName);
    return match ? match[1] : undefined;
}

/**
 * Compares two strings by UTF-16 code units so ordering never depends on the host locale
 */
export function compareCodeUnits(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}
