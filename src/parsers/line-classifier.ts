import type { ClassifiedLine, ContinuationLine, NewMessageLine } from '../types';
import { normaliseParticipantName, stripControlMarks } from '../utils/text.utils';

// ============================================================================
// LINE CLASSIFIER
// ============================================================================

/**
 * Transcript header examples:
 *   "00:24:39 [Instructor] Alexander Graham Bell: message"
 *   "01:46:25\tIssac Newton:\tmessage"        (tab separated)
 *   "09:05 PM Ada Lovelace (iPhone): message" (device suffix)
 *   "[10:21:31] Grace Hopper: message"
 *   "2024-02-05 10:21:31 Alan Turing: message"
 */
export const TIMESTAMP_PATTERNS: Array<{ regex: RegExp; kind: "clock" | "bracket" | "datetime" }> = [
    {
        regex: /^(\d{1,2}:\d{2}(?::\d{2})?(?:\s?[APap][Mm])?)\s+/,
        kind: "clock"
    },
    {
        regex: /^(\[\d{1,2}:\d{2}(?::\d{2})?(?:\s?[APap][Mm])?\])\s+/,
        kind: "bracket"
    },
    {
        regex: /^(\d{4}-\d{2}-\d{2}[T ]\d{1,2}:\d{2}(?::\d{2})?)\s+/,
        kind: "datetime"
    }
];

// Optional "[Role]" tag, then "Speaker:" and the message. Colons inside a
// balanced "(...)" belong to the speaker, e.g. "Ana (Zoom: iPhone): hi".
const HEADER_REGEX = /^(?:\[([^\]]*)\]\s*)?([^:[(][^:(]*(?:\([^()]*\)[^:(]*)*):(.*)$/;

// Unbalanced parentheses: split at the first colon
const FIRST_COLON_HEADER_REGEX = /^(?:\[([^\]]*)\]\s*)?([^:[][^:]*):(.*)$/;

// One trailing "(device)" annotation after the speaker name
const DEVICE_SUFFIX_REGEX = /\s*\([^()]*\)\s*$/;

type TimestampMatch = { timestamp: string; rest: string };
type HeaderMatch = { role?: string; speaker: string; message: string };

/**
 * Splits a leading timestamp token off the line. The token is kept verbatim.
 */
export function matchTimestamp(line: string): TimestampMatch | null {
    for (const pattern of TIMESTAMP_PATTERNS) {
        const match = pattern.regex.exec(line);
        if (match) {
            return { timestamp: match[1], rest: line.slice(match[0].length) };
        }
    }
    return null;
}

export function stripDeviceSuffix(speaker: string): string {
    return speaker.replace(DEVICE_SUFFIX_REGEX, '');
}

/**
 * Parses "[Role] Speaker (device): message" into its parts
 */
export function matchHeader(rest: string): HeaderMatch | null {
    const match = HEADER_REGEX.exec(rest) ?? FIRST_COLON_HEADER_REGEX.exec(rest);
    if (!match) {
        return null;
    }

    const [, rawRole, rawSpeaker, rawMessage] = match;
    const speaker = normaliseParticipantName(stripDeviceSuffix(rawSpeaker));
    if (!speaker) {
        return null;
    }

    const role = rawRole === undefined ? undefined : normaliseParticipantName(rawRole);

    return {
        role: role || undefined,
        speaker,
        message: rawMessage.trim()
    };
}

function continuation(line: string): ContinuationLine {
    return { kind: 'continuation', text: stripControlMarks(line).trimEnd() };
}

/**
 * Decides whether a line opens a new message or continues the previous one.
 * Never fails: anything without a "timestamp speaker:" header is a continuation.
 */
export function classifyLine(line: string): ClassifiedLine {
    const clean = stripControlMarks(line).trimEnd();

    const timestamp = matchTimestamp(clean);
    if (!timestamp) {
        return continuation(line);
    }

    const header = matchHeader(timestamp.rest);
    if (!header) {
        return continuation(line);
    }

    const message: NewMessageLine = {
        kind: 'message',
        timestamp: timestamp.timestamp,
        speaker: header.speaker,
        message: header.message
    };
    if (header.role) {
        message.role = header.role;
    }
    return message;
}
