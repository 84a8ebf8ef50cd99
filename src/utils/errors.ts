// ============================================================================
// ERROR TYPES
// ============================================================================

export type ChatAnalysisErrorCode = 'invalid_argument' | 'unreadable_input';

export class ChatAnalysisError extends Error {
    code: ChatAnalysisErrorCode;

    constructor(code: ChatAnalysisErrorCode, message: string) {
        super(message);
        this.name = 'ChatAnalysisError';
        this.code = code;
    }
}

/**
 * A caller broke a precondition (non-positive top N, no input files, unknown encoding)
 */
export class InvalidArgumentError extends ChatAnalysisError {
    constructor(message: string) {
        super('invalid_argument', message);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * File content that cannot be decoded as text, or a CSV export with the wrong layout
 */
export class UnreadableInputError extends ChatAnalysisError {
    fileName?: string;

    constructor(message: string, fileName?: string) {
        super('unreadable_input', message);
        this.name = 'UnreadableInputError';
        this.fileName = fileName;
    }
}
