/**
 * Speaker Message Counts and Rankings
 */

import type { ChatRecord, SpeakerRanking, SpeakerStats } from '../types';
import { InvalidArgumentError } from '../utils/errors';
import { compareCodeUnits } from '../utils/text.utils';

// ============================================================================
// SPEAKER IDENTITY
// ============================================================================

/**
 * Role and speaker together identify a participant, so "[TA] Bob" and "Bob" are counted apart
 */
export function speakerKey(entry: { speaker: string; role?: string }): string {
    return `${entry.role ?? ''}\u0000${entry.speaker}`;
}

/**
 * Orders by speaker name, then by role with untagged speakers first
 */
export function compareSpeakers(a: { speaker: string; role?: string }, b: { speaker: string; role?: string }): number {
    return compareCodeUnits(a.speaker, b.speaker) || compareCodeUnits(a.role ?? '', b.role ?? '');
}

// ============================================================================
// COUNTING & RANKING
// ============================================================================

/**
 * Counts messages per speaker identity, in order of first appearance
 */
export function countMessagesBySpeaker(records: readonly ChatRecord[]): SpeakerStats[] {
    const byKey = new Map<string, SpeakerStats>();

    for (const record of records) {
        const key = speakerKey(record);
        const existing = byKey.get(key);
        if (existing) {
            existing.messageCount += 1;
            continue;
        }

        const stats: SpeakerStats = { speaker: record.speaker, messageCount: 1 };
        if (record.role) {
            stats.role = record.role;
        }
        byKey.set(key, stats);
    }

    return Array.from(byKey.values());
}

/**
 * Ranks speakers into the top N most active and top N most silent.
 * Ties are broken by speaker name so the output never depends on input order.
 */
export function rankSpeakers(records: readonly ChatRecord[], topN: number): SpeakerRanking {
    if (!Number.isInteger(topN) || topN <= 0) {
        throw new InvalidArgumentError(`topN must be a positive integer, got ${topN}`);
    }

    const stats = countMessagesBySpeaker(records);

    const mostActive = [...stats]
        .sort((a, b) => b.messageCount - a.messageCount || compareSpeakers(a, b))
        .slice(0, topN)
        .map(s => ({ ...s }));

    const mostSilent = [...stats]
        .sort((a, b) => a.messageCount - b.messageCount || compareSpeakers(a, b))
        .slice(0, topN)
        .map(s => ({ ...s }));

    return { mostActive, mostSilent };
}
