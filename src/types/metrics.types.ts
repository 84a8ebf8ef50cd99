/**
 * Activity Statistics Type Definitions
 */

/**
 * Message count for one speaker identity. The same name with and without a
 * role tag is counted as two identities.
 */
export type SpeakerStats = {
    speaker: string;
    role?: string;
    messageCount: number;
};

export type SpeakerRanking = {
    mostActive: SpeakerStats[];
    mostSilent: SpeakerStats[];
};

export type ActivityLevel = 'very_active' | 'less_active' | 'absent';
export type ReactionLevel = 'active' | 'less_active' | 'none';

/**
 * Per-speaker counts inside one session (one input file)
 */
export type SessionParticipant = {
    speaker: string;
    role?: string;
    messageCount: number;
    reactionCount: number;
    chatCount: number;          // messages that are not reactions
    emojiCount: number;
};

export type SessionSummary = {
    label: string;              // "Day 1", "Day 2", ... by file position
    fileName: string;
    date?: string;              // opaque GMT<YYYYMMDD> token from the file name
    totalMessages: number;
    participants: SessionParticipant[];
};

export type SessionActivity = {
    sessions: SessionSummary[];
    meanChatCount: number;
    meanReactionCount: number;
};

export type ParticipantSessionNote = {
    session: string;
    activity: ActivityLevel;
    reaction: ReactionLevel;
    messageCount: number;
    reactionCount: number;
};

export type ParticipantNote = {
    speaker: string;
    role?: string;
    sessions: ParticipantSessionNote[];
    notes: string;
};
