/**
 * Meeting attendance per day and the notes that join it with chat activity
 */

import type {
    AttendanceEntry,
    AttendanceNote,
    AttendanceReport,
    AttendanceRow,
    AttendanceSession,
    ParticipantNote
} from '../types';
import { ABSENT_MARK, PRESENT_MARK, WEEKDAY_NAMES } from '../utils/constants';

// ============================================================================
// DAILY ATTENDANCE
// ============================================================================

export function weekdayName(time: number): string {
    return WEEKDAY_NAMES[new Date(time).getUTCDay()];
}

/**
 * Folds every join of a participant on one weekday into a single entry: the
 * first join time, the leave time of the last join and the summed minutes.
 * Days and participants keep the order of their earliest join.
 */
export function aggregateAttendance(rows: readonly AttendanceRow[]): AttendanceSession[] {
    const byDay = new Map<string, Map<string, AttendanceEntry>>();

    for (const row of [...rows].sort((a, b) => a.joinedAt - b.joinedAt)) {
        const day = weekdayName(row.joinedAt);
        let participants = byDay.get(day);
        if (!participants) {
            participants = new Map<string, AttendanceEntry>();
            byDay.set(day, participants);
        }

        const entry = participants.get(row.name);
        if (entry) {
            entry.leaveTime = row.leaveTime;
            entry.durationMinutes += row.durationMinutes;
        } else {
            participants.set(row.name, {
                name: row.name,
                email: row.email,
                joinTime: row.joinTime,
                leaveTime: row.leaveTime,
                durationMinutes: row.durationMinutes
            });
        }
    }

    return Array.from(byDay.entries()).map(([day, participants], index) => ({
        label: `Day ${index + 1}`,
        day,
        participants: Array.from(participants.values())
    }));
}

// ============================================================================
// NAME MATCHING
// ============================================================================

function nameTokens(name: string): Set<string> {
    return new Set(name.replace(/[^\p{L}\p{N}_]/gu, ' ').toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Finds the candidate that names the same person. An exact, case-insensitive
 * match wins; otherwise the candidate sharing the most name words, the first
 * one on a tie. Returns undefined when no candidate shares a word.
 */
export function matchParticipantName(name: string, candidates: readonly string[]): string | undefined {
    const lower = name.toLowerCase();
    const exact = candidates.find(candidate => candidate.toLowerCase() === lower);
    if (exact !== undefined) {
        return exact;
    }

    const wanted = nameTokens(name);
    let best: string | undefined;
    let bestShared = 0;

    for (const candidate of candidates) {
        let shared = 0;
        for (const token of nameTokens(candidate)) {
            if (wanted.has(token)) shared += 1;
        }
        if (shared > bestShared) {
            best = candidate;
            bestShared = shared;
        }
    }

    return best;
}

// ============================================================================
// ATTENDANCE NOTES
// ============================================================================

function describeAbsentChat(present: boolean[]): string {
    const days = present.filter(Boolean).length;
    if (days === 0) return 'Never present';
    if (days === present.length) return 'Always present but never chatted or reacted';
    return `Present on ${days} day(s) but never chatted or reacted`;
}

/**
 * Writes one attendance line per roster name, followed by that person's chat
 * notes, or a note saying they never chatted. Without a roster every name in
 * the attendance exports is used, in order of first appearance.
 */
export function describeAttendance(
    sessions: readonly AttendanceSession[],
    participantNotes: readonly ParticipantNote[],
    roster?: readonly string[]
): AttendanceNote[] {
    const names: readonly string[] = roster ?? Array.from(new Set(sessions.flatMap(session => session.participants.map(p => p.name))));
    const chatSpeakers = participantNotes.map(note => note.speaker);

    return names.map(name => {
        const present = sessions.map(session =>
            matchParticipantName(name, session.participants.map(p => p.name)) !== undefined
        );

        const speaker = matchParticipantName(name, chatSpeakers);
        const chatNote = participantNotes.find(note => note.speaker === speaker);

        return {
            name,
            present,
            attendance: present
                .map((isPresent, index) => `Day ${index + 1}: ${isPresent ? PRESENT_MARK : ABSENT_MARK}`)
                .join(' | '),
            notes: chatNote ? chatNote.notes : describeAbsentChat(present)
        };
    });
}

export function buildAttendanceReport(
    rows: readonly AttendanceRow[],
    participantNotes: readonly ParticipantNote[]
): AttendanceReport {
    const sessions = aggregateAttendance(rows);
    return { sessions, notes: describeAttendance(sessions, participantNotes) };
}
