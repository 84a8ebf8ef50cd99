/**
 * Per-session participation and activity notes
 */

import type {
    ActivityLevel,
    ChatFile,
    ParticipantNote,
    ParticipantSessionNote,
    ReactionLevel,
    SessionActivity,
    SessionParticipant,
    SessionSummary
} from '../types';
import { countEmojis, extractSessionDate, isReaction } from '../utils/text.utils';
import { compareSpeakers, speakerKey } from './speaker-ranker';

// ============================================================================
// SESSION BREAKDOWN
// ============================================================================

function summariseSession(file: ChatFile, index: number): SessionSummary {
    const byKey = new Map<string, SessionParticipant>();

    for (const record of file.records) {
        const key = speakerKey(record);
        let participant = byKey.get(key);
        if (!participant) {
            participant = {
                speaker: record.speaker,
                messageCount: 0,
                reactionCount: 0,
                chatCount: 0,
                emojiCount: 0
            };
            if (record.role) {
                participant.role = record.role;
            }
            byKey.set(key, participant);
        }

        participant.messageCount += 1;
        if (isReaction(record.message)) {
            participant.reactionCount += 1;
        } else {
            participant.chatCount += 1;
        }
        participant.emojiCount += countEmojis(record.message);
    }

    return {
        label: `Day ${index + 1}`,
        fileName: file.fileName,
        date: extractSessionDate(file.fileName),
        totalMessages: file.records.length,
        participants: Array.from(byKey.values())
    };
}

function flooredMean(values: number[]): number {
    if (values.length === 0) return 0;
    return Math.floor(values.reduce((sum, value) => sum + value, 0) / values.length);
}

/**
 * Breaks every file down into per-speaker counts. Each file is one session,
 * labelled "Day N" by its position in the list.
 */
export function computeSessionActivity(files: readonly ChatFile[]): SessionActivity {
    const sessions = files.map(summariseSession);
    const rows = sessions.flatMap(session => session.participants);

    return {
        sessions,
        meanChatCount: flooredMean(rows.map(row => row.chatCount)),
        meanReactionCount: flooredMean(rows.map(row => row.reactionCount))
    };
}

// ============================================================================
// PARTICIPANT NOTES
// ============================================================================

export function classifyActivity(messageCount: number, meanChatCount: number): ActivityLevel {
    if (messageCount <= 0) return 'absent';
    return messageCount >= meanChatCount ? 'very_active' : 'less_active';
}

export function classifyReactions(reactionCount: number, meanReactionCount: number): ReactionLevel {
    if (reactionCount <= 0) return 'none';
    return reactionCount >= meanReactionCount ? 'active' : 'less_active';
}

function describeSession(note: ParticipantSessionNote): string {
    if (note.activity === 'absent') {
        return `${note.session}: did not chat or react`;
    }

    const chat = note.activity === 'very_active'
        ? `very active in chat (${note.messageCount})`
        : `less active in chat (${note.messageCount})`;

    const reactions = note.reaction === 'none'
        ? 'no reactions'
        : note.reaction === 'active'
            ? `reacting actively (${note.reactionCount})`
            : `reacting occasionally (${note.reactionCount})`;

    return `${note.session}: ${chat}, ${reactions}`;
}

/**
 * Writes one note per speaker covering every session, sorted by speaker name
 */
export function describeParticipantActivity(activity: SessionActivity): ParticipantNote[] {
    const speakers = new Map<string, { speaker: string; role?: string }>();
    for (const session of activity.sessions) {
        for (const participant of session.participants) {
            const key = speakerKey(participant);
            if (!speakers.has(key)) {
                speakers.set(key, participant.role
                    ? { speaker: participant.speaker, role: participant.role }
                    : { speaker: participant.speaker });
            }
        }
    }

    return Array.from(speakers.entries())
        .sort(([, a], [, b]) => compareSpeakers(a, b))
        .map(([key, identity]) => {
            const sessions = activity.sessions.map((session): ParticipantSessionNote => {
                const participant = session.participants.find(p => speakerKey(p) === key);
                const messageCount = participant?.messageCount ?? 0;
                const reactionCount = participant?.reactionCount ?? 0;
                return {
                    session: session.label,
                    activity: classifyActivity(messageCount, activity.meanChatCount),
                    reaction: classifyReactions(reactionCount, activity.meanReactionCount),
                    messageCount,
                    reactionCount
                };
            });

            return {
                ...identity,
                sessions,
                notes: sessions.map(describeSession).join(' | ')
            };
        });
}
