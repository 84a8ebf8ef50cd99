import type { ActivityReport, AnalysisOptions, AttendanceRow, ChatFile } from '../types';
import { mergeChatFiles } from '../parsers/chat-merger';
import { countMessagesBySpeaker, rankSpeakers } from './speaker-ranker';
import { computeSessionActivity, describeParticipantActivity } from './session-activity.computer';
import { buildAttendanceReport } from './attendance.computer';

// ============================================================================
// ACTIVITY REPORT
// ============================================================================

/**
 * Runs the whole analysis over already parsed files. Recomputed from scratch on every call.
 * Attendance rows, when given, add the daily attendance and its notes.
 */
export function analyseChatFiles(
    files: readonly ChatFile[],
    options: AnalysisOptions,
    attendanceRows?: readonly AttendanceRow[]
): ActivityReport {
    const records = mergeChatFiles(files);
    const ranking = rankSpeakers(records, options.topN);
    const activity = computeSessionActivity(files);
    const participantNotes = describeParticipantActivity(activity);

    const report: ActivityReport = {
        options,
        files: files.map(file => file.fileName),
        records,
        speakers: countMessagesBySpeaker(records),
        ranking,
        activity,
        participantNotes
    };

    if (attendanceRows) {
        report.attendance = buildAttendanceReport(attendanceRows, participantNotes);
    }
    return report;
}
