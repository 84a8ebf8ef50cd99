/**
 * Transcript Line and Record Type Definitions
 */

/**
 * One physical line of a transcript, as read from its source file
 */
export type RawLine = {
    text: string;
    sourceFile: string;
    lineNumber: number;         // 1-based
};

/**
 * A line that opens a new chat message: "<timestamp> [Role] Speaker (device): message"
 */
export type NewMessageLine = {
    kind: 'message';
    timestamp: string;
    role?: string;
    speaker: string;
    message: string;
};

/**
 * A line without a recognisable header. Belongs to the previous message.
 */
export type ContinuationLine = {
    kind: 'continuation';
    text: string;
};

export type ClassifiedLine = NewMessageLine | ContinuationLine;

/**
 * A complete chat message. The timestamp is kept exactly as it appeared in the transcript.
 */
export type ChatRecord = {
    timestamp: string;
    role?: string;
    speaker: string;
    message: string;
    sourceFile: string;
};

/**
 * The parsed records of a single transcript file
 */
export type ChatFile = {
    fileName: string;
    records: ChatRecord[];
};
